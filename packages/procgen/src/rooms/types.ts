/**
 * Room capability interfaces.
 *
 * Steps and pipelines depend on these interfaces only; the storage backend
 * is chosen when the room is constructed.
 */

import type { GenerationError, Result } from "@roomforge/contracts";
import type {
  Area,
  LocalPosition,
  OrdinalDirection,
  Position,
  Size,
} from "../core/geometry";
import type { TileType } from "../core/tiles";

export type RoomId = string;

/**
 * Reference from a portal tile to another room.
 * The target is an identifier resolved after generation, never a live room.
 */
export interface PortalLink {
  readonly position: LocalPosition;
  readonly direction: OrdinalDirection;
  readonly target: RoomId;
  /**
   * Where the traveller arrives in the target room, once known.
   * Set when the return portal is placed.
   */
  readonly exit?: LocalPosition;
}

export interface RoomOptions {
  readonly id?: RoomId;
  /** World position of local (0, 0). Defaults to the world origin. */
  readonly origin?: Position;
}

/**
 * Read-only view of a room, handed to callers once generation is done.
 */
export interface ReadonlyRoom {
  readonly id: RoomId;
  readonly origin: Position;
  /** Whether writes outside the current bounds grow the room. */
  readonly expandable: boolean;

  size(): Size;
  /** Current bounds in local space. */
  area(): Area;
  isInBounds(p: LocalPosition): boolean;

  /**
   * `undefined` outside the bounds, VOID inside when never written.
   */
  tileTypeAtLocal(p: LocalPosition): TileType | undefined;
  tileTypeAt(p: Position): TileType | undefined;

  toWorld(p: LocalPosition): Position;
  toLocal(p: Position): LocalPosition;

  /** Visit every non-VOID tile. Order is unspecified. */
  forEachTile(callback: (p: LocalPosition, type: TileType) => void): void;
  /** Tiles of a type inside the bounds. VOID counts unwritten cells. */
  countTiles(type: TileType): number;
  portals(): readonly PortalLink[];
}

/**
 * Mutable room, owned by a pipeline while it generates.
 */
export interface Room extends ReadonlyRoom {
  /**
   * Write a tile. Expandable rooms grow to include the position;
   * fixed rooms throw OUT_OF_BOUNDS.
   */
  setTileAtLocal(p: LocalPosition, type: TileType): void;
  trySetTileAtLocal(
    p: LocalPosition,
    type: TileType,
  ): Result<void, GenerationError>;
  setTileAt(p: Position, type: TileType): void;

  /** Whether every cell of `target` can be written. */
  canContain(target: Area): boolean;

  /** Write a PORTAL tile at the link position and record the link. */
  addPortal(link: PortalLink): void;

  /**
   * Swap a recorded link for an updated copy on the same tile.
   * Returns false when `previous` is not one of this room's links.
   */
  replacePortal(previous: PortalLink, next: PortalLink): boolean;

  /**
   * Forget every link at `p`. The tile itself is left as it is.
   * Overwriting a PORTAL tile with anything else does this implicitly.
   */
  removePortalsAt(p: LocalPosition): readonly PortalLink[];
}
