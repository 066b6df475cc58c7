/**
 * Success or failure as a value.
 *
 * Room writes and pipeline results use it where the caller is expected
 * to branch on failure rather than let it propagate.
 *
 * @example
 * ```typescript
 * const written = room
 *   .trySetTileAtLocal(localPosition(12, 0), TileType.FLOOR)
 *   .mapErr((err) => err.code)
 *   .getOrElse(undefined);
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  /**
   * Catch whatever `fn` throws. Without `onError` the thrown value becomes
   * the error unchanged.
   */
  static fromThrowable<T, E = Error>(
    fn: () => T,
    onError?: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      const error = onError ? onError(e) : (e as E);
      return Result.err(error);
    }
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  // --- transforming -------------------------------------------------------

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this._isOk) {
      return Result.ok(fn(this._value as T));
    }
    return Result.err(this._error as E);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    if (this._isOk) {
      return Result.ok(this._value as T);
    }
    return Result.err(fn(this._error as E));
  }

  /** Chain another fallible operation; the first error wins */
  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this._isOk) {
      return fn(this._value as T);
    }
    return Result.err(this._error as E);
  }

  /** Side effect on the error only, e.g. a trace warning */
  tapErr(fn: (error: E) => void): Result<T, E> {
    if (!this._isOk) {
      fn(this._error as E);
    }
    return this;
  }

  // --- leaving Result -----------------------------------------------------

  getOrElse(defaultValue: T): T {
    return this._isOk ? (this._value as T) : defaultValue;
  }

  /** The value, or the error thrown as is */
  getOrThrow(): T {
    if (this._isOk) {
      return this._value as T;
    }
    throw this._error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this._isOk ? onOk(this._value as T) : onErr(this._error as E);
  }

  get success(): boolean {
    return this._isOk;
  }

  /** Throws on an Err; check `success` first */
  get value(): T {
    if (!this._isOk) {
      throw new Error("Cannot access value of Err Result");
    }
    return this._value as T;
  }

  /** Throws on an Ok; check `success` first */
  get error(): E {
    if (this._isOk) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this._error as E;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
