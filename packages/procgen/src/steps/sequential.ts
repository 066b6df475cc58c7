import type { GenerationStep, StepContext } from "../pipeline/types";
import type { Room } from "../rooms/types";

/**
 * Several steps applied in order as one.
 *
 * A failing inner step stops the sequence; earlier inner steps keep their
 * writes. Every inner `start` trace event gets its `end`, failed or not.
 */
export class SequentialStep implements GenerationStep {
  readonly id: string;
  readonly steps: readonly GenerationStep[];

  constructor(steps: readonly GenerationStep[], id = "sequential") {
    this.id = id;
    this.steps = [...steps];
  }

  apply(room: Room, ctx: StepContext): void {
    for (const step of this.steps) {
      ctx.trace.start(step.id);
      const start = performance.now();
      try {
        step.apply(room, ctx);
      } finally {
        ctx.trace.end(step.id, performance.now() - start);
      }
    }
  }
}
