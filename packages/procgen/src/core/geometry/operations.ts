/**
 * Geometry operations - pure functions over positions, sizes and areas.
 */

import { GenerationError } from "@roomforge/contracts";
import type { Area, LocalPosition, Position, Size } from "./types";

function assertCoordinate(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw GenerationError.invalidGeometry(
      `${label} must be a safe integer, got ${value}`,
      { [label]: value },
    );
  }
}

function assertExtent(value: number, label: string): void {
  assertCoordinate(value, label);
  if (value < 0) {
    throw GenerationError.invalidGeometry(
      `${label} must be non-negative, got ${value}`,
      { [label]: value },
    );
  }
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function position(x: number, y: number): Position {
  assertCoordinate(x, "x");
  assertCoordinate(y, "y");
  return { space: "world", x, y };
}

export function localPosition(x: number, y: number): LocalPosition {
  assertCoordinate(x, "x");
  assertCoordinate(y, "y");
  return { space: "local", x, y };
}

export function size(width: number, height: number): Size {
  assertExtent(width, "width");
  assertExtent(height, "height");
  return { width, height };
}

export function area(x: number, y: number, width: number, height: number): Area {
  assertCoordinate(x, "x");
  assertCoordinate(y, "y");
  assertExtent(width, "width");
  assertExtent(height, "height");
  return { x, y, width, height };
}

export const ZERO_SIZE: Size = { width: 0, height: 0 };

export const WORLD_ORIGIN: Position = { space: "world", x: 0, y: 0 };

// =============================================================================
// COORDINATE SPACES
// =============================================================================

/**
 * Translate a room-local position into world space.
 * Throws INVALID_GEOMETRY if the result leaves the safe-integer range.
 */
export function toWorld(local: LocalPosition, origin: Position): Position {
  return position(local.x + origin.x, local.y + origin.y);
}

/**
 * Inverse of {@link toWorld}.
 */
export function toLocal(world: Position, origin: Position): LocalPosition {
  return localPosition(world.x - origin.x, world.y - origin.y);
}

/**
 * Local position shifted by an offset
 */
export function offsetLocal(
  p: LocalPosition,
  dx: number,
  dy: number,
): LocalPosition {
  return localPosition(p.x + dx, p.y + dy);
}

export function positionsEqual(
  a: Position | LocalPosition,
  b: Position | LocalPosition,
): boolean {
  return a.space === b.space && a.x === b.x && a.y === b.y;
}

/**
 * Stable map key for a coordinate pair
 */
export function positionKey(x: number, y: number): string {
  return `${x},${y}`;
}

// =============================================================================
// SIZE / AREA OPERATIONS
// =============================================================================

export function sizesEqual(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

export function isEmptySize(s: Size): boolean {
  return s.width === 0 || s.height === 0;
}

export function isEmptyArea(a: Area): boolean {
  return a.width === 0 || a.height === 0;
}

/**
 * Area anchored at local (0, 0)
 */
export function areaFromSize(s: Size): Area {
  return { x: 0, y: 0, width: s.width, height: s.height };
}

export function areaSize(a: Area): Size {
  return { width: a.width, height: a.height };
}

/**
 * Rightmost column inside the area (inclusive)
 */
export function areaRight(a: Area): number {
  return a.x + a.width - 1;
}

/**
 * Bottom row inside the area (inclusive)
 */
export function areaBottom(a: Area): number {
  return a.y + a.height - 1;
}

export function areaContains(a: Area, x: number, y: number): boolean {
  return x >= a.x && x < a.x + a.width && y >= a.y && y < a.y + a.height;
}

/**
 * True if `inner` lies entirely inside `outer`. Empty areas fit anywhere.
 */
export function areaContainsArea(outer: Area, inner: Area): boolean {
  if (isEmptyArea(inner)) return true;
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  );
}

/**
 * Smallest area covering `a` and the cell at (x, y).
 * An empty `a` contributes nothing.
 */
export function areaIncluding(a: Area, x: number, y: number): Area {
  if (isEmptyArea(a)) {
    return { x, y, width: 1, height: 1 };
  }
  if (areaContains(a, x, y)) return a;

  const minX = Math.min(a.x, x);
  const minY = Math.min(a.y, y);
  const maxX = Math.max(areaRight(a), x);
  const maxY = Math.max(areaBottom(a), y);
  return { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

/**
 * Accept either a size (anchored at the origin) or an explicit area
 */
export function resolveArea(target: Size | Area): Area {
  if ("x" in target) return target;
  return areaFromSize(target);
}
