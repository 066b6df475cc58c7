import { GenerationError } from "@roomforge/contracts";
import {
  type Area,
  areaContains,
  areaContainsArea,
  areaFromSize,
  type Size,
  size as createSize,
} from "../core/geometry";
import { DenseTileStore, type TileType } from "../core/tiles";
import { BaseRoom } from "./base-room";
import type { RoomOptions } from "./types";

/**
 * Fixed-size room backed by a dense array.
 *
 * Bounds are always `[0, width) × [0, height)`; writing outside them throws
 * OUT_OF_BOUNDS and leaves the room unchanged.
 */
export class FixedRoom extends BaseRoom {
  readonly expandable = false;
  private readonly bounds: Area;

  constructor(dimensions: Size, options: RoomOptions = {}) {
    const validated = createSize(dimensions.width, dimensions.height);
    super(new DenseTileStore(validated.width, validated.height), options);
    this.bounds = areaFromSize(validated);
  }

  area(): Area {
    return this.bounds;
  }

  canContain(target: Area): boolean {
    return areaContainsArea(this.bounds, target);
  }

  protected writeTile(x: number, y: number, type: TileType): void {
    if (!areaContains(this.bounds, x, y)) {
      throw GenerationError.outOfBounds(
        `Local position (${x}, ${y}) is outside room "${this.id}" ` +
          `(${this.bounds.width}x${this.bounds.height})`,
        {
          roomId: this.id,
          x,
          y,
          width: this.bounds.width,
          height: this.bounds.height,
        },
      );
    }
    this.store.set(x, y, type);
  }
}
