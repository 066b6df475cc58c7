/**
 * Pipeline types: steps, their context, tracing and results.
 */

import type {
  GenerationError,
  PipelineConfigInput,
  SeededRandom,
} from "@roomforge/contracts";
import type { Area, Size } from "../core/geometry";
import type { TileType } from "../core/tiles";
import type { ReadonlyRoomRegistry, RoomRegistry } from "../rooms/registry";
import type { Room } from "../rooms/types";

// =============================================================================
// TRACING
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "warning" | "skip";

export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly stepId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * "Explain why" payload of a decision event
 */
export interface DecisionData {
  readonly question: string;
  readonly options: readonly unknown[];
  readonly chosen: unknown;
  readonly reason: string;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(stepId: string): void;
  end(stepId: string, durationMs: number): void;
  decision(
    stepId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(stepId: string, message: string): void;
  skip(stepId: string, reason: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

// =============================================================================
// STEPS
// =============================================================================

/**
 * What a step may use besides the room it is applied to.
 */
export interface StepContext {
  /** Randomness source. Steps must not use Math.random(). */
  readonly rng: SeededRandom;
  readonly trace: TraceCollector;
  /** Rooms of this run; portal targets are resolved here. */
  readonly rooms: RoomRegistry;
}

/**
 * A single composable transformation of a room.
 *
 * Steps carry parameters only. They must not keep a reference to the room
 * after `apply` returns, and report failure by throwing a GenerationError.
 */
export interface GenerationStep {
  readonly id: string;
  apply(room: Room, ctx: StepContext): void;
}

/**
 * A step class whose constructor takes no arguments (default parameters).
 */
export type DefaultStepConstructor<TStep extends GenerationStep = GenerationStep> =
  new () => TStep;

// =============================================================================
// CONFIGURATION
// =============================================================================

export type PipelineConfig = PipelineConfigInput;

export interface ValidatedPipelineConfig {
  readonly seed: number;
  readonly trace: boolean;
  readonly captureSnapshots: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: ValidatedPipelineConfig = {
  seed: 0,
  trace: false,
  captureSnapshots: false,
};

// =============================================================================
// METRICS & SNAPSHOTS
// =============================================================================

export type TileCounts = Readonly<Record<TileType, number>>;

/**
 * Lightweight per-step measurements
 */
export interface StepMetrics {
  readonly stepId: string;
  readonly stepIndex: number;
  readonly durationMs: number;
  readonly size: Size;
  readonly floorCount: number;
  readonly wallCount: number;
  /** Recorded portal links, as in snapshots */
  readonly portalCount: number;
}

export type StepMetricsCallback = (metrics: StepMetrics) => void;

/**
 * State of the room after a step
 */
export interface RoomSnapshot {
  readonly stepId: string;
  readonly stepIndex: number;
  readonly area: Area;
  readonly tileCounts: TileCounts;
  readonly portalCount: number;
}

export interface PipelineOptions {
  /** Custom random source. Overrides the seed from the config. */
  readonly rng?: SeededRandom;
  /**
   * Registry shared with other pipelines of the same run. The pipeline's
   * own room is added to it.
   */
  readonly rooms?: RoomRegistry;
  /** A throw from the callback fails the step it reports on. */
  readonly onStepMetrics?: StepMetricsCallback;
}

// =============================================================================
// STATE & RESULTS
// =============================================================================

export type PipelineState = "building" | "failed" | "built";

export interface FailedStep {
  readonly id: string;
  readonly index: number;
}

interface PipelineResultBase {
  /** Every room reached during the run, the pipeline's own included */
  readonly rooms: ReadonlyRoomRegistry;
  readonly trace: readonly TraceEvent[];
  readonly snapshots: readonly RoomSnapshot[];
  readonly stepCount: number;
  readonly durationMs: number;
}

export interface PipelineSuccess<TRoom extends Room> extends PipelineResultBase {
  readonly success: true;
  readonly room: TRoom;
}

/**
 * Failed generation. `room` holds every write made before the failing
 * step; nothing is rolled back.
 */
export interface PipelineFailure<TRoom extends Room> extends PipelineResultBase {
  readonly success: false;
  readonly error: GenerationError;
  readonly failedStep: FailedStep;
  readonly room: TRoom;
}

export type PipelineResult<TRoom extends Room> =
  | PipelineSuccess<TRoom>
  | PipelineFailure<TRoom>;
