/**
 * Strategy registry and factory
 */

import type { RangeMinimum, StrategyDescriptor, StrategyName } from "./types.js";
import { InvalidTypeError } from "./errors.js";
import { NaiveRangeMinimum } from "./strategies/naive.js";
import { SqrtDecomposition } from "./strategies/sqrt-decomposition.js";
import { SegmentTree } from "./strategies/segment-tree.js";
import { SparseTable } from "./strategies/sparse-table.js";

/**
 * Strategy names in registry order
 */
export const STRATEGY_NAMES = ["naive", "sqrt", "segment", "sparse"] as const satisfies readonly StrategyName[];

/**
 * Strategy used when none is requested
 */
export const DEFAULT_STRATEGY: StrategyName = "segment";

/**
 * Descriptors for every strategy, keyed by name
 */
export const STRATEGIES: Readonly<Record<StrategyName, StrategyDescriptor>> = {
  naive: {
    name: "naive",
    title: "Naive scan",
    description: "No auxiliary state; each query scans the range linearly",
    complexity: { build: "O(N)", update: "O(1)", query: "O(N)", space: "O(N)" },
    create: (values) => new NaiveRangeMinimum(values),
  },
  sqrt: {
    name: "sqrt",
    title: "Square-root decomposition",
    description: "Blocks of ceil(sqrt(N)) elements with a cached minimum per block",
    complexity: { build: "O(N)", update: "O(√N)", query: "O(√N)", space: "O(N)" },
    create: (values) => new SqrtDecomposition(values),
  },
  segment: {
    name: "segment",
    title: "Segment tree",
    description: "Binary tree of range minima in a flat 4N buffer",
    complexity: { build: "O(N)", update: "O(log N)", query: "O(log N)", space: "O(N)" },
    create: (values) => new SegmentTree(values),
  },
  sparse: {
    name: "sparse",
    title: "Sparse table",
    description: "Power-of-two window minima; static, rebuilt in full on every update",
    complexity: {
      build: "O(N log N)",
      update: "O(N log N)",
      query: "O(1)",
      space: "O(N log N)",
    },
    create: (values) => new SparseTable(values),
  },
};

/**
 * Check whether a value names a registered strategy
 */
export function isStrategyName(value: unknown): value is StrategyName {
  return typeof value === "string" && STRATEGY_NAMES.some((name) => name === value);
}

/**
 * Build a range-minimum structure
 * @param strategy - Strategy to use
 * @param values - Initial sequence (copied)
 * @throws InvalidTypeError if the strategy is unknown or values is not an array of numbers
 * @throws EmptyInputError if values is empty
 */
export function createRangeMinimum(
  strategy: StrategyName,
  values: readonly number[]
): RangeMinimum {
  if (!isStrategyName(strategy)) {
    throw new InvalidTypeError(
      `Unknown strategy "${String(strategy)}". Expected one of: ${STRATEGY_NAMES.join(", ")}`
    );
  }
  return STRATEGIES[strategy].create(values);
}
