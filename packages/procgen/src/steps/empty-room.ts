import { type Area, type Size, ZERO_SIZE } from "../core/geometry";
import { TileType } from "../core/tiles";
import type { GenerationStep, StepContext } from "../pipeline/types";
import type { Room } from "../rooms/types";
import { FillTilesStep } from "./fill-tiles";

/**
 * Carve an empty room: FLOOR over `[0, width) × [0, height)`, or over an
 * explicit area. Other tiles are left as they are.
 *
 * Idempotent. The default (zero) size carves nothing.
 *
 * @example
 * ```typescript
 * RoomPipeline.create(new SparseRoom())
 *   .genWith(new EmptyRoomStep(size(40, 30)))
 *   .build();
 * ```
 */
export class EmptyRoomStep implements GenerationStep {
  readonly id = "empty-room";
  private readonly fill: FillTilesStep;

  constructor(target: Size | Area = ZERO_SIZE) {
    this.fill = new FillTilesStep(target, TileType.FLOOR, this.id);
  }

  get target(): Area {
    return this.fill.target;
  }

  apply(room: Room, ctx: StepContext): void {
    this.fill.apply(room, ctx);
  }
}
