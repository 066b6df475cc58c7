import { RoomPipeline } from "../pipeline/builder";
import type { GenerationStep, StepContext } from "../pipeline/types";
import type { RoomFactory } from "../rooms/registry";
import type { Room, RoomId } from "../rooms/types";

export interface TraversePortalsOptions {
  /** Also apply the step to the room the traversal starts from. */
  readonly includeOrigin?: boolean;
}

/**
 * Apply a step to every room reachable through portal links.
 *
 * Targets are looked up in the run's room registry and created through
 * `roomFactory` the first time they are reached. Each target gets its own
 * pipeline, sharing the registry and a random stream forked from the
 * caller's. The walk is depth-first and post-order: a room's own targets
 * are generated before the room itself. Each room is visited once, so
 * cycles from return portals terminate.
 *
 * Links added by the step are not followed in the same pass.
 *
 * @example
 * ```typescript
 * RoomPipeline.create(new SparseRoom({ id: "hub" }))
 *   .genWith(new EmptyRoomStep(size(12, 8)))
 *   .genWith(new EdgePortalsStep({ count: 3 }))
 *   .genWith(
 *     new TraversePortalsStep(
 *       new EmptyRoomStep(size(3, 10)),
 *       (id) => new SparseRoom({ id }),
 *     ),
 *   )
 *   .build();
 * ```
 */
export class TraversePortalsStep implements GenerationStep {
  readonly id: string;
  readonly includeOrigin: boolean;

  constructor(
    private readonly step: GenerationStep,
    private readonly roomFactory: RoomFactory,
    options: TraversePortalsOptions = {},
  ) {
    this.includeOrigin = options.includeOrigin ?? false;
    this.id = `traverse(${step.id})`;
  }

  apply(room: Room, ctx: StepContext): void {
    if (this.includeOrigin) {
      this.step.apply(room, ctx);
    }

    const visited = new Set<RoomId>([room.id]);
    const generated = this.visitTargets(room, ctx, visited);

    ctx.trace.decision(
      this.id,
      "Portal traversal",
      [...visited],
      generated,
      `Applied "${this.step.id}" to ${generated.length} linked rooms`,
    );
  }

  private visitTargets(
    room: Room,
    ctx: StepContext,
    visited: Set<RoomId>,
  ): RoomId[] {
    const generated: RoomId[] = [];
    const targets = room.portals().map((link) => link.target);

    for (const id of targets) {
      if (visited.has(id)) continue;
      visited.add(id);

      const target = ctx.rooms.resolve(id, this.roomFactory);
      generated.push(...this.visitTargets(target, ctx, visited));
      this.generate(target, ctx);
      generated.push(id);
    }

    return generated;
  }

  private generate(target: Room, ctx: StepContext): void {
    const result = RoomPipeline.create(
      target,
      { trace: ctx.trace.enabled },
      { rng: ctx.rng.fork(), rooms: ctx.rooms },
    )
      .genWith(this.step)
      .build();

    if (!result.success) {
      ctx.trace.warning(
        this.id,
        `Room "${target.id}" failed at "${result.failedStep.id}"`,
      );
      throw result.error;
    }
  }
}
