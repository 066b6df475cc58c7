import { EdgePortalsOptionsSchema, parseWith } from "@roomforge/contracts";
import {
  areaBottom,
  areaRight,
  type LocalPosition,
  localPosition,
  type OrdinalDirection,
} from "../core/geometry";
import type { GenerationStep, StepContext } from "../pipeline/types";
import type { ReadonlyRoom, Room, RoomId } from "../rooms/types";

export type PortalTargetResolver = (index: number, room: ReadonlyRoom) => RoomId;

export interface EdgePortalsOptions {
  /** Number of portals to place. Defaults to 1. */
  readonly count?: number;
  /** Identifier of the room each portal leads to. */
  readonly target?: PortalTargetResolver;
}

/**
 * Edges smaller than this have no interior cell to hold a portal
 */
const MIN_EDGE_LENGTH = 3;

/**
 * Numbered after the links the room already has, so a second placement
 * step does not reuse the first one's ids
 */
const defaultTarget: PortalTargetResolver = (_index, room) =>
  `${room.id}/portal-${room.portals().length}`;

/**
 * Place PORTAL tiles on the edges of the room's bounds.
 *
 * Each portal consumes exactly three random values: the edge axis (vertical
 * edges weighted by height), the side, and the offset along the edge, which
 * excludes the corners. Rooms under 3x3 get no portals.
 */
export class EdgePortalsStep implements GenerationStep {
  readonly id = "edge-portals";
  readonly count: number;
  private readonly target: PortalTargetResolver;

  constructor(options: EdgePortalsOptions = {}) {
    const parsed = parseWith(
      EdgePortalsOptionsSchema,
      { count: options.count ?? 1 },
      "edge portal options",
    ).getOrThrow();
    this.count = parsed.count;
    this.target = options.target ?? defaultTarget;
  }

  apply(room: Room, ctx: StepContext): void {
    const bounds = room.area();
    if (bounds.width < MIN_EDGE_LENGTH || bounds.height < MIN_EDGE_LENGTH) {
      ctx.trace.skip(
        this.id,
        `Room ${bounds.width}x${bounds.height} is too small for edge portals`,
      );
      return;
    }

    const verticalOdds = bounds.height / (bounds.width + bounds.height);

    for (let i = 0; i < this.count; i++) {
      const onVerticalEdge = ctx.rng.probability(verticalOdds);
      const firstSide = ctx.rng.probability(0.5);
      let position: LocalPosition;
      let direction: OrdinalDirection;

      if (onVerticalEdge) {
        const y = bounds.y + ctx.rng.range(1, bounds.height - 2);
        position = localPosition(firstSide ? bounds.x : areaRight(bounds), y);
        direction = firstSide ? "east" : "west";
      } else {
        const x = bounds.x + ctx.rng.range(1, bounds.width - 2);
        position = localPosition(x, firstSide ? bounds.y : areaBottom(bounds));
        direction = firstSide ? "south" : "north";
      }

      const target = this.target(i, room);
      room.addPortal({ position, direction, target });

      ctx.trace.decision(
        this.id,
        "Portal placement",
        ["north", "east", "south", "west"],
        direction,
        `Portal ${i} at (${position.x}, ${position.y}) leads to "${target}"`,
      );
    }
  }
}
