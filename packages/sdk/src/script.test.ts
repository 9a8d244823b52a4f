import { describe, it, expect } from "vitest";
import { runOperations } from "./script.js";
import { createRangeMinimum } from "./registry.js";
import { IndexOutOfBoundsError } from "./errors.js";
import type { Operation } from "./types.js";

describe("runOperations", () => {
  it("should apply updates and collect query results in order", () => {
    const rmq = createRangeMinimum("segment", [5.0, 3.0, 8.0, 2.0, 7.0]);
    const ops: Operation[] = [
      { op: "query", left: 1, right: 3 },
      { op: "update", index: 3, value: 10.0 },
      { op: "query", left: 0, right: 4 },
      { op: "update", index: 1, value: -5.0 },
      { op: "query", left: 0, right: 4 },
    ];

    expect(runOperations(rmq, ops)).toEqual([2.0, 3.0, -5.0]);
  });

  it("should return no results for an update-only script", () => {
    const rmq = createRangeMinimum("naive", [1, 2]);
    expect(runOperations(rmq, [{ op: "update", index: 0, value: 4 }])).toEqual([]);
    expect(rmq.toArray()).toEqual([4, 2]);
  });

  it("should stop at the first rejected operation", () => {
    const rmq = createRangeMinimum("sqrt", [1, 2, 3]);
    const ops: Operation[] = [
      { op: "update", index: 0, value: 9 },
      { op: "update", index: 3, value: 0 },
      { op: "update", index: 1, value: 9 },
    ];

    expect(() => runOperations(rmq, ops)).toThrow(IndexOutOfBoundsError);
    expect(rmq.toArray()).toEqual([9, 2, 3]);
  });
});
