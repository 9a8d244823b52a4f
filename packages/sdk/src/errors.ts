/**
 * Error types for range-minimum structures
 *
 * Invariants:
 * - Every error is raised synchronously by the operation that detects it
 * - Every error leaves the structure unchanged and usable
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all rangemin errors
 */
export abstract class RangeMinError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an argument has the wrong kind (non-array input, non-integer index, non-number value)
 */
export class InvalidTypeError extends RangeMinError {
  readonly code = "INVALID_TYPE";
}

/**
 * Thrown when a structure is constructed from a zero-length sequence
 */
export class EmptyInputError extends RangeMinError {
  readonly code = "EMPTY_INPUT";

  constructor(options?: ErrorOptions) {
    super("Input sequence cannot be empty", options);
  }
}

/**
 * Thrown when an index or range bound falls outside [0, size)
 */
export class IndexOutOfBoundsError extends RangeMinError {
  readonly code = "INDEX_OUT_OF_BOUNDS";

  constructor(
    public readonly index: number,
    public readonly size: number,
    options?: ErrorOptions
  ) {
    super(`Index ${index} is out of bounds for size ${size}`, options);
  }
}

/**
 * Thrown when a query range has left > right
 */
export class InvalidRangeError extends RangeMinError {
  readonly code = "INVALID_RANGE";

  constructor(
    public readonly left: number,
    public readonly right: number,
    options?: ErrorOptions
  ) {
    super(`Left index ${left} cannot be greater than right index ${right}`, options);
  }
}
