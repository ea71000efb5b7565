/**
 * Error codes for grid and search operations.
 * Using discriminated union for type-safe error handling.
 */
export type GridErrorCode =
  | "CONFIG_INVALID"
  | "OUT_OF_BOUNDS"
  | "INVALID_DIRECTION"
  | "INVALID_MOVEMENT"
  | "SIZE_MISMATCH"
  | "UNREACHABLE"
  | "INVALID_COST"
  | "LOOP"
  | "EMPTY";

/**
 * Unified error type for coordinate, container and search failures.
 *
 * These are returned inside a `Result`, never thrown by the library:
 * they describe valid-but-unsatisfiable input.
 *
 * @example
 * ```typescript
 * const error = GridError.outOfBounds(5, 0, { width: 3, height: 3 });
 * error.code; // "OUT_OF_BOUNDS"
 * ```
 */
export class GridError extends Error {
  override readonly name = "GridError";

  constructor(
    public readonly code: GridErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridError);
    }
  }

  static create(
    code: GridErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError(code, message, details);
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("CONFIG_INVALID", message, details);
  }

  static outOfBounds(
    x: number,
    y: number,
    dimensions: { readonly width: number; readonly height: number },
  ): GridError {
    return new GridError(
      "OUT_OF_BOUNDS",
      `(${x},${y}) is outside the ${dimensions.width}x${dimensions.height} grid`,
      { x, y, width: dimensions.width, height: dimensions.height },
    );
  }

  /**
   * Input that is not a `{ x, y }` pair of non-negative integers at all,
   * so there is no coordinate to report.
   */
  static malformedPoint(issues: readonly string[]): GridError {
    return new GridError("OUT_OF_BOUNDS", "Malformed point", { issues });
  }

  static notSquare(dimensions: {
    readonly width: number;
    readonly height: number;
  }): GridError {
    return new GridError(
      "OUT_OF_BOUNDS",
      "Rotation requires a square grid",
      { width: dimensions.width, height: dimensions.height },
    );
  }

  static indexOutOfBounds(index: number, size: number): GridError {
    return new GridError(
      "OUT_OF_BOUNDS",
      `Index ${index} is outside [0, ${size})`,
      { index, size },
    );
  }

  static invalidDirection(dx: number, dy: number): GridError {
    return new GridError(
      "INVALID_DIRECTION",
      `(${dx},${dy}) is not a unit direction`,
      { dx, dy },
    );
  }

  static invalidMovement(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("INVALID_MOVEMENT", message, details);
  }

  static sizeMismatch(expected: number, actual: number): GridError {
    return new GridError(
      "SIZE_MISMATCH",
      `Expected ${expected} values, got ${actual}`,
      { expected, actual },
    );
  }

  static unreachable(details?: Record<string, unknown>): GridError {
    return new GridError("UNREACHABLE", "Destination unreachable", details);
  }

  static invalidCost(cost: number, details?: Record<string, unknown>): GridError {
    return new GridError(
      "INVALID_COST",
      `Move cost must be a finite non-negative number, got ${cost}`,
      { cost, ...details },
    );
  }

  static loop(steps: number): GridError {
    return new GridError(
      "LOOP",
      `Direction map loops: gave up after ${steps} steps`,
      { steps },
    );
  }

  static empty(message: string): GridError {
    return new GridError("EMPTY", message);
  }

  static isGridError(error: unknown): error is GridError {
    return error instanceof GridError;
  }

  toJSON(): {
    name: string;
    code: GridErrorCode;
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
