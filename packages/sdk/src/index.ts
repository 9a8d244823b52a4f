/**
 * rangemin SDK
 *
 * Point-update, range-minimum queries over a mutable sequence, with four
 * interchangeable strategies
 */

// Re-export types
export type {
  StrategyName,
  Complexity,
  RangeMinimum,
  StrategyDescriptor,
  Operation,
} from "./types.js";

// Re-export strategies
export { RangeMinimumBase } from "./strategies/base.js";
export { NaiveRangeMinimum } from "./strategies/naive.js";
export { SqrtDecomposition } from "./strategies/sqrt-decomposition.js";
export { SegmentTree } from "./strategies/segment-tree.js";
export { SparseTable } from "./strategies/sparse-table.js";

// Re-export registry and utilities
export {
  STRATEGIES,
  STRATEGY_NAMES,
  DEFAULT_STRATEGY,
  isStrategyName,
  createRangeMinimum,
} from "./registry.js";
export { runOperations } from "./script.js";
export {
  validateSequence,
  validateIndex,
  validateValue,
  validateUpdate,
  validateRange,
} from "./validation.js";

// Re-export observability
export { instrument, createInstrumented } from "./instrument.js";
export { MetricsCollector, metrics } from "./observability/metrics.js";
export type { OperationKind, StrategyMetrics } from "./observability/metrics.js";
export { logger, formatLogEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, StructureEvent, StructureRef } from "./observability/logs.js";

// Re-export errors
export {
  RangeMinError,
  InvalidTypeError,
  EmptyInputError,
  IndexOutOfBoundsError,
  InvalidRangeError,
} from "./errors.js";
