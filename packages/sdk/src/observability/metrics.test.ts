import { describe, it, expect } from "vitest";
import { MetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  it("should keep only the last 100 samples", () => {
    const collector = new MetricsCollector();
    for (let i = 0; i < 150; i++) {
      collector.record("naive", "query", i);
    }

    const m = collector.getMetrics("naive");
    expect(m?.queryCount).toBe(150);
    expect(m?.queryTimeMs).toHaveLength(100);
    expect(m?.queryTimeMs[0]).toBe(50);
  });

  it("should compute p95", () => {
    const collector = new MetricsCollector();
    expect(collector.getP95([])).toBe(0);
    expect(collector.getP95([5])).toBe(5);

    for (let i = 1; i <= 20; i++) {
      collector.record("sparse", "update", i);
    }
    // ceil(20 * 0.95) - 1 = 18 -> 19
    expect(collector.getP95Time("sparse", "update")).toBe(19);
    expect(collector.getP95Time("segment", "update")).toBe(0);
  });

  it("should reset one strategy or all", () => {
    const collector = new MetricsCollector();
    collector.record("naive", "build", 1);
    collector.record("sqrt", "build", 1);

    collector.reset("naive");
    expect(collector.getMetrics("naive")).toBeUndefined();
    expect(collector.getAllMetrics().size).toBe(1);

    collector.reset();
    expect(collector.getAllMetrics().size).toBe(0);
  });
});
