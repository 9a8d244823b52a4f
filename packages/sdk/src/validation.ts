/**
 * Argument validation shared by every strategy
 */

import {
  EmptyInputError,
  IndexOutOfBoundsError,
  InvalidRangeError,
  InvalidTypeError,
} from "./errors.js";

/**
 * Validate an input sequence and copy it into an owned buffer
 * @param values - Candidate sequence
 * @returns Private copy of the sequence
 * @throws InvalidTypeError if values is not an array of numbers
 * @throws EmptyInputError if values is empty
 */
export function validateSequence(values: unknown): Float64Array {
  if (!Array.isArray(values)) {
    throw new InvalidTypeError("Input sequence must be an array");
  }
  if (values.length === 0) {
    throw new EmptyInputError();
  }

  const copy = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const value: unknown = values[i];
    if (typeof value !== "number" || Number.isNaN(value)) {
      throw new InvalidTypeError(`Element at index ${i} must be a number, got: ${String(value)}`);
    }
    copy[i] = value;
  }
  return copy;
}

/**
 * Validate an element index
 * @param index - Index to validate
 * @param size - Sequence length
 * @throws InvalidTypeError if index is not an integer
 * @throws IndexOutOfBoundsError if index is outside [0, size)
 */
export function validateIndex(index: unknown, size: number): asserts index is number {
  if (!isInteger(index)) {
    throw new InvalidTypeError(`Index must be an integer, got: ${String(index)}`);
  }
  assertInBounds(index, size);
}

/**
 * Validate an element value
 * @throws InvalidTypeError if value is not a number
 */
export function validateValue(value: unknown): asserts value is number {
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new InvalidTypeError(`Value must be a number, got: ${String(value)}`);
  }
}

/**
 * Validate update arguments
 * Both types are checked before the bounds
 * @param index - Element index
 * @param value - New element value
 * @param size - Sequence length
 */
export function validateUpdate(index: unknown, value: unknown, size: number): void {
  if (!isInteger(index)) {
    throw new InvalidTypeError(`Index must be an integer, got: ${String(index)}`);
  }
  validateValue(value);
  assertInBounds(index, size);
}

/**
 * Validate inclusive query bounds
 * Checks run in order: type, bounds, ordering
 * @param left - Range start
 * @param right - Range end
 * @param size - Sequence length
 */
export function validateRange(left: unknown, right: unknown, size: number): void {
  if (!isInteger(left) || !isInteger(right)) {
    throw new InvalidTypeError(
      `Both left and right indices must be integers, got: ${String(left)}, ${String(right)}`
    );
  }
  assertInBounds(left, size);
  assertInBounds(right, size);
  if (left > right) {
    throw new InvalidRangeError(left, right);
  }
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function assertInBounds(index: number, size: number): void {
  if (index < 0 || index >= size) {
    throw new IndexOutOfBoundsError(index, size);
  }
}
