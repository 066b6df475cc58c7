/**
 * Error codes for room generation.
 */
export type GenerationErrorCode =
  | "OUT_OF_BOUNDS"
  | "CAPACITY_EXCEEDED"
  | "INVALID_GEOMETRY"
  | "CONFIG_INVALID"
  | "STEP_FAILED"
  | "PIPELINE_FINISHED";

/**
 * Unified error type for tile writes, steps and pipelines.
 *
 * @example
 * ```typescript
 * throw GenerationError.capacityExceeded("Carve area does not fit the room", {
 *   area: { x: 0, y: 0, width: 12, height: 8 },
 *   roomSize: { width: 10, height: 10 },
 * });
 * ```
 */
export class GenerationError extends Error {
  readonly name = "GenerationError";

  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  static outOfBounds(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("OUT_OF_BOUNDS", message, details);
  }

  static capacityExceeded(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("CAPACITY_EXCEEDED", message, details);
  }

  static invalidGeometry(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("INVALID_GEOMETRY", message, details);
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("CONFIG_INVALID", message, details);
  }

  /**
   * Wrap a foreign throw from inside a step. The thrown value becomes `cause`.
   */
  static stepFailed(
    message: string,
    cause: unknown,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("STEP_FAILED", message, details, { cause });
  }

  static pipelineFinished(roomId: string): GenerationError {
    return new GenerationError(
      "PIPELINE_FINISHED",
      `Pipeline for room "${roomId}" has already been built`,
      { roomId },
    );
  }

  static is(error: unknown): error is GenerationError {
    return error instanceof GenerationError;
  }

  toJSON(): {
    name: string;
    code: GenerationErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
