import { type Area, areaIncluding } from "../core/geometry";
import { SparseTileStore, TileType } from "../core/tiles";
import { BaseRoom } from "./base-room";
import type { RoomOptions } from "./types";

/**
 * Expandable room backed by a hash map.
 *
 * Starts empty with zero-size bounds. Every non-VOID write grows the bounds
 * to include it, negative local coordinates included. Bounds never shrink:
 * erasing a tile with VOID leaves them as they were.
 *
 * @example
 * ```typescript
 * const room = new SparseRoom({ id: "entrance" });
 * room.setTileAtLocal(localPosition(3, 2), TileType.FLOOR);
 * room.size(); // { width: 1, height: 1 }
 * ```
 */
export class SparseRoom extends BaseRoom {
  readonly expandable = true;
  private bounds: Area = { x: 0, y: 0, width: 0, height: 0 };

  constructor(options: RoomOptions = {}) {
    super(new SparseTileStore(), options);
  }

  area(): Area {
    return this.bounds;
  }

  canContain(_target: Area): boolean {
    return true;
  }

  protected writeTile(x: number, y: number, type: TileType): void {
    this.store.set(x, y, type);
    if (type !== TileType.VOID) {
      this.bounds = areaIncluding(this.bounds, x, y);
    }
  }
}
