/**
 * Core types for rangemin
 */

/**
 * Names of the available range-minimum strategies
 */
export type StrategyName = "naive" | "sqrt" | "segment" | "sparse";

/**
 * Asymptotic cost of each operation, as human-readable big-O strings
 */
export interface Complexity {
  build: string;
  update: string;
  query: string;
  space: string;
}

/**
 * A mutable sequence answering range-minimum queries.
 *
 * Invariants:
 * - The structure owns a private copy of the sequence it was built from
 * - Arguments are validated before any mutation or traversal, so a failed
 *   call leaves the structure unchanged
 * - `query(l, r)` equals the minimum of the literal elements in `[l, r]`
 */
export interface RangeMinimum {
  /** Strategy backing this structure */
  readonly strategy: StrategyName;
  /** Number of elements (N >= 1) */
  readonly size: number;

  /**
   * Replace the element at `index`
   * @throws InvalidTypeError if index is not an integer or value is not a number
   * @throws IndexOutOfBoundsError if index is outside [0, size)
   */
  update(index: number, value: number): void;

  /**
   * Minimum over the inclusive range [left, right]
   * @throws InvalidTypeError if a bound is not an integer
   * @throws IndexOutOfBoundsError if a bound is outside [0, size)
   * @throws InvalidRangeError if left > right
   */
  query(left: number, right: number): number;

  /**
   * Current element at `index`
   */
  at(index: number): number;

  /**
   * Copy of the current sequence
   */
  toArray(): number[];
}

/**
 * Registry entry describing one strategy
 */
export interface StrategyDescriptor {
  name: StrategyName;
  /** Short display title */
  title: string;
  description: string;
  complexity: Complexity;
  /** Build a structure of this strategy from a sequence */
  create(values: readonly number[]): RangeMinimum;
}

/**
 * One step of an operation script
 */
export type Operation =
  | { op: "update"; index: number; value: number }
  | { op: "query"; left: number; right: number };
