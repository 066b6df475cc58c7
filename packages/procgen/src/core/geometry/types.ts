/**
 * Core geometry types for room generation.
 * All types are immutable value objects with integer coordinates.
 */

/**
 * World-space coordinate
 */
export interface Position {
  readonly space: "world";
  readonly x: number;
  readonly y: number;
}

/**
 * Coordinate relative to a room's origin
 */
export interface LocalPosition {
  readonly space: "local";
  readonly x: number;
  readonly y: number;
}

/**
 * Non-negative extent. Zero-area sizes are legal and describe an empty room.
 */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/**
 * Rectangle in room-local space: `[x, x + width) × [y, y + height)`
 */
export interface Area {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Neighbour offsets, clockwise from north
 */
export const DIRECTIONS_4 = [
  { x: 0, y: -1 }, // N
  { x: 1, y: 0 }, // E
  { x: 0, y: 1 }, // S
  { x: -1, y: 0 }, // W
] as const;

export const DIRECTIONS_8 = [
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
  { x: -1, y: 0 }, // W
  { x: 1, y: 0 }, // E
  { x: -1, y: 1 }, // SW
  { x: 0, y: 1 }, // S
  { x: 1, y: 1 }, // SE
] as const;

export type Offset = (typeof DIRECTIONS_8)[number];

/**
 * Direction faced when stepping through a portal into the room
 */
export type OrdinalDirection = "north" | "east" | "south" | "west";
