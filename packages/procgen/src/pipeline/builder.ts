/**
 * Room pipeline builder.
 *
 * Owns one room and applies generation steps to it in call order. Each
 * `genWith`/`gen` call applies its step immediately; `build()` ends
 * generation and hands the room back.
 */

import {
  Err,
  GenerationError,
  Ok,
  type Result,
  SeededRandom,
} from "@roomforge/contracts";
import { areaSize } from "../core/geometry";
import { TileType } from "../core/tiles";
import { RoomRegistry } from "../rooms/registry";
import type { Room } from "../rooms/types";
import { validatePipelineConfig } from "./config";
import { createTraceCollector } from "./trace";
import type {
  DefaultStepConstructor,
  FailedStep,
  GenerationStep,
  PipelineConfig,
  PipelineOptions,
  PipelineResult,
  PipelineState,
  RoomSnapshot,
  StepContext,
  StepMetrics,
  TileCounts,
  TraceCollector,
  ValidatedPipelineConfig,
} from "./types";

function countTiles(room: Room): TileCounts {
  return {
    [TileType.VOID]: room.countTiles(TileType.VOID),
    [TileType.FLOOR]: room.countTiles(TileType.FLOOR),
    [TileType.WALL]: room.countTiles(TileType.WALL),
    [TileType.PORTAL]: room.countTiles(TileType.PORTAL),
  };
}

function captureSnapshot(
  room: Room,
  stepId: string,
  stepIndex: number,
): RoomSnapshot {
  return {
    stepId,
    stepIndex,
    area: room.area(),
    tileCounts: countTiles(room),
    portalCount: room.portals().length,
  };
}

function collectStepMetrics(
  room: Room,
  stepId: string,
  stepIndex: number,
  durationMs: number,
): StepMetrics {
  return {
    stepId,
    stepIndex,
    durationMs,
    size: areaSize(room.area()),
    floorCount: room.countTiles(TileType.FLOOR),
    wallCount: room.countTiles(TileType.WALL),
    portalCount: room.portals().length,
  };
}

/**
 * Normalise anything a step threw into a GenerationError
 */
function toStepError(
  error: unknown,
  step: GenerationStep,
  index: number,
): GenerationError {
  if (GenerationError.is(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  return GenerationError.stepFailed(
    `Step ${index} (${step.id}) failed: ${message}`,
    error,
    { stepId: step.id, stepIndex: index },
  );
}

/**
 * Pipeline over any room backend.
 *
 * States: `building` until a step fails (`failed`) or `build()` is called
 * (`built`, terminal). After a failure later steps are skipped, and the
 * writes made before the failure stay in the room.
 *
 * @example
 * ```typescript
 * const result = RoomPipeline.create(new SparseRoom())
 *   .genWith(new EmptyRoomStep(size(40, 30)))
 *   .gen(WalledRoomStep)
 *   .build();
 *
 * if (result.success) {
 *   result.room.tileTypeAtLocal(localPosition(0, 0)); // FLOOR
 * }
 * ```
 */
export class RoomPipeline<TRoom extends Room = Room> {
  readonly config: ValidatedPipelineConfig;
  private readonly room: TRoom;
  private readonly trace: TraceCollector;
  private readonly ctx: StepContext;
  private readonly options: PipelineOptions;
  private readonly snapshots: RoomSnapshot[] = [];
  private readonly startTime: number;
  private stepCount = 0;
  private _state: PipelineState = "building";
  private failure: { error: GenerationError; step: FailedStep } | undefined;

  private constructor(
    room: TRoom,
    config: ValidatedPipelineConfig,
    options: PipelineOptions,
  ) {
    this.startTime = performance.now();
    this.room = room;
    this.config = config;
    this.options = options;
    this.trace = createTraceCollector(config.trace);
    this.ctx = {
      rng: options.rng ?? new SeededRandom(config.seed),
      trace: this.trace,
      rooms: options.rooms ?? new RoomRegistry(),
    };
    this.ctx.rooms.add(room);
  }

  /**
   * Start a pipeline that takes ownership of `room`.
   * Throws CONFIG_INVALID for a malformed config, or when another room
   * already holds `room.id` in the supplied registry.
   */
  static create<TRoom extends Room>(
    room: TRoom,
    config?: PipelineConfig,
    options: PipelineOptions = {},
  ): RoomPipeline<TRoom> {
    return new RoomPipeline(room, validatePipelineConfig(config), options);
  }

  get state(): PipelineState {
    return this._state;
  }

  /**
   * Apply a step with explicit parameters
   */
  genWith(step: GenerationStep): this {
    if (this._state === "built") {
      throw GenerationError.pipelineFinished(this.room.id);
    }

    const index = this.stepCount++;

    if (this._state === "failed") {
      this.trace.skip(
        step.id,
        `Skipped after failure at step ${this.failure?.step.index}`,
      );
      return this;
    }

    this.trace.start(step.id);
    const start = performance.now();

    try {
      step.apply(this.room, this.ctx);
    } catch (error) {
      this.fail(toStepError(error, step, index), { id: step.id, index });
      return this;
    }

    const duration = performance.now() - start;
    this.trace.end(step.id, duration);

    if (this.config.captureSnapshots) {
      this.snapshots.push(captureSnapshot(this.room, step.id, index));
    }
    if (this.options.onStepMetrics) {
      try {
        this.options.onStepMetrics(
          collectStepMetrics(this.room, step.id, index, duration),
        );
      } catch (error) {
        this.fail(toStepError(error, step, index), { id: step.id, index });
      }
    }

    return this;
  }

  /**
   * Apply a step constructed with its default parameters
   */
  gen(StepClass: DefaultStepConstructor): this {
    if (this._state === "built") {
      throw GenerationError.pipelineFinished(this.room.id);
    }
    return this.genWith(new StepClass());
  }

  /**
   * Finish generation and hand the room to the caller
   */
  build(): PipelineResult<TRoom> {
    if (this._state === "built") {
      throw GenerationError.pipelineFinished(this.room.id);
    }

    const failure = this.failure;
    this._state = "built";

    const base = {
      room: this.room,
      rooms: this.ctx.rooms,
      trace: this.trace.getEvents(),
      snapshots: this.snapshots,
      stepCount: this.stepCount,
      durationMs: performance.now() - this.startTime,
    };

    if (failure) {
      return {
        ...base,
        success: false,
        error: failure.error,
        failedStep: failure.step,
      };
    }
    return { ...base, success: true };
  }

  private fail(error: GenerationError, step: FailedStep): void {
    this.trace.warning(step.id, `${error.code}: ${error.message}`);
    this.failure = { error, step };
    this._state = "failed";
  }
}

/**
 * View a pipeline result as a Result, dropping trace and snapshots
 */
export function toResult<TRoom extends Room>(
  result: PipelineResult<TRoom>,
): Result<TRoom, GenerationError> {
  return result.success ? Ok(result.room) : Err(result.error);
}
