import {
  AreaSchema,
  GenerationError,
  parseWith,
  SizeSchema,
} from "@roomforge/contracts";
import {
  type Area,
  isEmptyArea,
  localPosition,
  resolveArea,
  type Size,
} from "../core/geometry";
import { isTileType, type TileType, tileTypeName } from "../core/tiles";
import type { GenerationStep, StepContext } from "../pipeline/types";
import type { Room } from "../rooms/types";

/**
 * Validate a carve/fill target. Bad geometry is a programming error.
 */
export function parseTarget(target: Size | Area): Area {
  const schema = "x" in target ? AreaSchema : SizeSchema;
  const parsed = parseWith(schema, target, "target area")
    .mapErr((err) => GenerationError.invalidGeometry(err.message, err.details))
    .getOrThrow();
  return resolveArea(parsed);
}

/**
 * Write `type` to every cell of `target`.
 *
 * Capacity is checked before the first write: a target the room cannot hold
 * throws CAPACITY_EXCEEDED and leaves the room untouched.
 */
export function fillArea(
  room: Room,
  target: Area,
  type: TileType,
  stepId: string,
  ctx: StepContext,
): void {
  if (isEmptyArea(target)) {
    ctx.trace.skip(stepId, "Target area is empty");
    return;
  }

  if (!room.canContain(target)) {
    const bounds = room.area();
    throw GenerationError.capacityExceeded(
      `Area ${target.width}x${target.height} at (${target.x}, ${target.y}) ` +
        `does not fit room "${room.id}" (${bounds.width}x${bounds.height})`,
      { stepId, roomId: room.id, target, bounds },
    );
  }

  for (let y = target.y; y < target.y + target.height; y++) {
    for (let x = target.x; x < target.x + target.width; x++) {
      room.setTileAtLocal(localPosition(x, y), type);
    }
  }

  ctx.trace.decision(
    stepId,
    "Fill area",
    [target],
    tileTypeName(type),
    `Wrote ${target.width * target.height} ${tileTypeName(type)} tiles`,
  );
}

/**
 * Fill a rectangle with a single tile type.
 * A `Size` target is anchored at local (0, 0).
 */
export class FillTilesStep implements GenerationStep {
  readonly id: string;
  readonly target: Area;
  readonly tileType: TileType;

  constructor(target: Size | Area, tileType: TileType, id = "fill-tiles") {
    if (!isTileType(tileType)) {
      throw GenerationError.configInvalid(`Unknown tile type: ${tileType}`, {
        tileType,
      });
    }
    this.id = id;
    this.target = parseTarget(target);
    this.tileType = tileType;
  }

  apply(room: Room, ctx: StepContext): void {
    fillArea(room, this.target, this.tileType, this.id, ctx);
  }
}
