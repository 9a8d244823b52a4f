/**
 * Metrics tracking for structure operations
 */

import type { StrategyName } from "../types.js";

export type OperationKind = "build" | "update" | "query";

export interface StrategyMetrics {
  buildCount: number;
  updateCount: number;
  queryCount: number;
  errorCount: number;
  buildTimeMs: number[];
  updateTimeMs: number[];
  queryTimeMs: number[];
}

/**
 * Samples kept per operation; older samples are dropped
 */
const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<StrategyName, StrategyMetrics>();

  /**
   * Get or create metrics for a strategy
   */
  #getMetrics(strategy: StrategyName): StrategyMetrics {
    let metrics = this.#metrics.get(strategy);
    if (!metrics) {
      metrics = {
        buildCount: 0,
        updateCount: 0,
        queryCount: 0,
        errorCount: 0,
        buildTimeMs: [],
        updateTimeMs: [],
        queryTimeMs: [],
      };
      this.#metrics.set(strategy, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation and its duration
   */
  record(strategy: StrategyName, kind: OperationKind, ms: number): void {
    const metrics = this.#getMetrics(strategy);
    const samples = metrics[`${kind}TimeMs`];
    metrics[`${kind}Count`]++;
    samples.push(ms);

    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Record a rejected call
   */
  recordError(strategy: StrategyName): void {
    this.#getMetrics(strategy).errorCount++;
  }

  /**
   * Get metrics for a strategy
   */
  getMetrics(strategy: StrategyName): StrategyMetrics | undefined {
    return this.#metrics.get(strategy);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<StrategyName, StrategyMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)];
  }

  /**
   * Get p95 duration of an operation kind
   */
  getP95Time(strategy: StrategyName, kind: OperationKind): number {
    const metrics = this.#metrics.get(strategy);
    return metrics ? this.getP95(metrics[`${kind}TimeMs`]) : 0;
  }

  /**
   * Reset metrics for one strategy, or all of them
   */
  reset(strategy?: StrategyName): void {
    if (strategy) {
      this.#metrics.delete(strategy);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
