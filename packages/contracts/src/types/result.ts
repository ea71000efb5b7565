/**
 * A Result type for explicit, type-safe error handling.
 *
 * Every user-input failure in gridnav (out-of-bounds coordinates, a
 * container built from the wrong number of values, an unreachable
 * destination) comes back as an `Err` rather than an exception.
 *
 * @example
 * ```typescript
 * const path = GridSpace.create({ width: 3, height: 3 })
 *   .flatMap((space) => space.position(2, 2))
 *   .flatMap((dest) => astarSearch(unitMove, dest.space.first, dest))
 *   .getOrElse([]);
 * ```
 */
type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Create a Result from a nullable value.
   */
  static fromNullable<T, E>(
    value: T | null | undefined,
    error: E,
  ): Result<T, E> {
    return value != null ? Result.ok(value) : Result.err(error);
  }

  /**
   * Create a Result from a function that might throw.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this.state.ok) {
      return Result.ok(fn(this.state.value));
    }
    return Result.err(this.state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    if (this.state.ok) {
      return Result.ok(this.state.value);
    }
    return Result.err(fn(this.state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this.state.ok) {
      return fn(this.state.value);
    }
    return Result.err(this.state.error);
  }

  getOrElse(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  getOrThrow(): T {
    if (this.state.ok) {
      return this.state.value;
    }
    throw this.state.error;
  }

  /**
   * The value, or undefined for an Err.
   */
  ok(): T | undefined {
    return this.state.ok ? this.state.value : undefined;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this.state.ok ? onOk(this.state.value) : onErr(this.state.error);
  }

  tap(fn: (value: T) => void): Result<T, E> {
    if (this.state.ok) {
      fn(this.state.value);
    }
    return this;
  }

  tapErr(fn: (error: E) => void): Result<T, E> {
    if (!this.state.ok) {
      fn(this.state.error);
    }
    return this;
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    if (this.state.ok) {
      return { success: true, value: this.state.value };
    }
    return { success: false, error: this.state.error };
  }

  get success(): boolean {
    return this.state.ok;
  }

  get value(): T {
    if (!this.state.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return this.state.value;
  }

  get error(): E {
    if (this.state.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this.state.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
