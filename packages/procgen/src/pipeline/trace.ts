/**
 * Trace collectors for debugging generation.
 */

import type {
  DecisionData,
  TraceCollector,
  TraceEvent,
  TraceEventType,
} from "./types";

/**
 * Records every event in memory
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = true) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(stepId: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      stepId,
      eventType,
      data,
    });
  }

  start(stepId: string): void {
    this.emit(stepId, "start");
  }

  end(stepId: string, durationMs: number): void {
    this.emit(stepId, "end", { durationMs });
  }

  decision(
    stepId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    const data: DecisionData = { question, options, chosen, reason };
    this.emit(stepId, "decision", data);
  }

  warning(stepId: string, message: string): void {
    this.emit(stepId, "warning", { message });
  }

  skip(stepId: string, reason: string): void {
    this.emit(stepId, "skip", { reason });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Discards everything
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_stepId: string): void {}
  end(_stepId: string, _durationMs: number): void {}
  decision(
    _stepId: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_stepId: string, _message: string): void {}
  skip(_stepId: string, _reason: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
