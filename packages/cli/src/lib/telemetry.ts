/**
 * Telemetry and observability helpers
 */

import { metrics, type StrategyName } from "@rangemin/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Emit the collected operation metrics of one strategy
 */
export function emitStrategyMetrics(strategy: StrategyName): void {
  const m = metrics.getMetrics(strategy);
  if (!m) {
    return;
  }

  emitMetric(`rmq.${strategy}`, {
    builds: m.buildCount,
    updates: m.updateCount,
    queries: m.queryCount,
    errors: m.errorCount,
    build_p95_ms: metrics.getP95(m.buildTimeMs).toFixed(3),
    update_p95_ms: metrics.getP95(m.updateTimeMs).toFixed(3),
    query_p95_ms: metrics.getP95(m.queryTimeMs).toFixed(3),
  });
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(label, {
      duration_ms: duration,
      success,
    });
  }
}
