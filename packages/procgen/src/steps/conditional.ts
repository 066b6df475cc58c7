import type { GenerationStep, StepContext } from "../pipeline/types";
import type { ReadonlyRoom, Room } from "../rooms/types";

export type RoomPredicate = (room: ReadonlyRoom) => boolean;

/**
 * Apply `step` only when `predicate` holds for the room as it is now.
 */
export class ConditionalStep implements GenerationStep {
  readonly id: string;

  constructor(
    private readonly predicate: RoomPredicate,
    private readonly step: GenerationStep,
    id = `if(${step.id})`,
  ) {
    this.id = id;
  }

  apply(room: Room, ctx: StepContext): void {
    if (!this.predicate(room)) {
      ctx.trace.skip(this.id, `Condition not met, "${this.step.id}" skipped`);
      return;
    }
    this.step.apply(room, ctx);
  }
}
