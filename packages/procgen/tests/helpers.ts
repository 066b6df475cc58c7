import { SeededRandom } from "@roomforge/contracts";
import {
  DefaultTraceCollector,
  type PipelineFailure,
  type PipelineResult,
  type PipelineSuccess,
  type Room,
  RoomRegistry,
} from "../src";

/**
 * Step context with a recording trace and an empty registry, for applying
 * steps directly
 */
export function createContext(seed = 1): {
  rng: SeededRandom;
  trace: DefaultTraceCollector;
  rooms: RoomRegistry;
} {
  return {
    rng: new SeededRandom(seed),
    trace: new DefaultTraceCollector(),
    rooms: new RoomRegistry(),
  };
}

export function expectSuccess<TRoom extends Room>(
  result: PipelineResult<TRoom>,
): PipelineSuccess<TRoom> {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.code}`);
  }
  return result;
}

export function expectFailure<TRoom extends Room>(
  result: PipelineResult<TRoom>,
): PipelineFailure<TRoom> {
  if (result.success) {
    throw new Error("Expected pipeline to fail");
  }
  return result;
}
