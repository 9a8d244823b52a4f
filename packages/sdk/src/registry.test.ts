import { describe, it, expect } from "vitest";
import {
  STRATEGIES,
  STRATEGY_NAMES,
  DEFAULT_STRATEGY,
  isStrategyName,
  createRangeMinimum,
} from "./registry.js";
import { InvalidTypeError } from "./errors.js";
import { NaiveRangeMinimum } from "./strategies/naive.js";
import { SqrtDecomposition } from "./strategies/sqrt-decomposition.js";
import { SegmentTree } from "./strategies/segment-tree.js";
import { SparseTable } from "./strategies/sparse-table.js";
import type { StrategyName } from "./types.js";

describe("strategy registry", () => {
  it("should list strategies in registry order", () => {
    expect(STRATEGY_NAMES).toEqual(["naive", "sqrt", "segment", "sparse"]);
    expect(Object.keys(STRATEGIES)).toEqual([...STRATEGY_NAMES]);
  });

  it("should default to the segment tree", () => {
    expect(DEFAULT_STRATEGY).toBe("segment");
  });

  it("should describe each strategy under its own name", () => {
    for (const name of STRATEGY_NAMES) {
      expect(STRATEGIES[name].name).toBe(name);
    }
    expect(STRATEGIES.sparse.complexity.query).toBe("O(1)");
    expect(STRATEGIES.sparse.complexity.update).toBe("O(N log N)");
    expect(STRATEGIES.segment.complexity.update).toBe("O(log N)");
  });

  it("should recognize strategy names", () => {
    expect(isStrategyName("sqrt")).toBe(true);
    expect(isStrategyName("fenwick")).toBe(false);
    expect(isStrategyName(3)).toBe(false);
  });
});

describe("createRangeMinimum", () => {
  it("should build the requested class", () => {
    const values = [3, 1, 2];
    expect(createRangeMinimum("naive", values)).toBeInstanceOf(NaiveRangeMinimum);
    expect(createRangeMinimum("sqrt", values)).toBeInstanceOf(SqrtDecomposition);
    expect(createRangeMinimum("segment", values)).toBeInstanceOf(SegmentTree);
    expect(createRangeMinimum("sparse", values)).toBeInstanceOf(SparseTable);
  });

  it("should reject an unknown strategy", () => {
    const unknown: unknown = "fenwick";
    expect(() => createRangeMinimum(unknown as StrategyName, [1])).toThrow(InvalidTypeError);
    expect(() => createRangeMinimum(unknown as StrategyName, [1])).toThrow(
      'Unknown strategy "fenwick". Expected one of: naive, sqrt, segment, sparse'
    );
  });
});
