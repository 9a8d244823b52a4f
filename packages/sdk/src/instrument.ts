/**
 * Timing decorator for range-minimum structures
 */

import { performance } from "node:perf_hooks";
import type { RangeMinimum, StrategyName } from "./types.js";
import { createRangeMinimum } from "./registry.js";
import { metrics as globalMetrics, type MetricsCollector } from "./observability/metrics.js";

/**
 * Build a structure and record the build duration
 * @param strategy - Strategy to use
 * @param values - Initial sequence
 * @param collector - Metrics sink (default: global collector)
 * @returns Instrumented structure
 */
export function createInstrumented(
  strategy: StrategyName,
  values: readonly number[],
  collector: MetricsCollector = globalMetrics
): RangeMinimum {
  const start = performance.now();
  let structure: RangeMinimum;
  try {
    structure = createRangeMinimum(strategy, values);
  } catch (err) {
    collector.recordError(strategy);
    throw err;
  }
  collector.record(strategy, "build", performance.now() - start);
  return instrument(structure, collector);
}

/**
 * Wrap a structure so each update and query is timed
 *
 * Rejected calls are counted as errors and re-thrown unchanged.
 * @param structure - Structure to wrap
 * @param collector - Metrics sink (default: global collector)
 */
export function instrument(
  structure: RangeMinimum,
  collector: MetricsCollector = globalMetrics
): RangeMinimum {
  const timed = <T>(kind: "update" | "query", fn: () => T): T => {
    const start = performance.now();
    let result: T;
    try {
      result = fn();
    } catch (err) {
      collector.recordError(structure.strategy);
      throw err;
    }
    collector.record(structure.strategy, kind, performance.now() - start);
    return result;
  };

  return {
    strategy: structure.strategy,
    size: structure.size,
    update: (index, value) => timed("update", () => structure.update(index, value)),
    query: (left, right) => timed("query", () => structure.query(left, right)),
    at: (index) => structure.at(index),
    toArray: () => structure.toArray(),
  };
}
