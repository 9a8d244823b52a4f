import { describe, it, expect } from "vitest";
import { SparseTable } from "./sparse-table.js";

describe("SparseTable", () => {
  it.each([
    [1, 1],
    [2, 2],
    [3, 2],
    [4, 3],
    [5, 3],
    [8, 4],
    [9, 4],
    [16, 5],
  ])("should build floor(log2 N) + 1 levels (N=%i -> %i)", (size, levels) => {
    const table = new SparseTable(Array.from({ length: size }, (_, i) => i));
    expect(table.levels).toBe(levels);
  });

  it("should answer the full range when N is a power of two", () => {
    const table = new SparseTable([6, 4, 7, 5, 3, 8, 9, 2]);
    expect(table.query(0, 7)).toBe(2);
    expect(table.query(0, 3)).toBe(4);
    expect(table.query(4, 6)).toBe(3);
  });

  it("should combine two overlapping windows", () => {
    // len 6 -> two windows of 4: [1..4] and [3..6]
    const table = new SparseTable([0, 9, 8, 7, 6, 5, 10, -1]);
    expect(table.query(1, 6)).toBe(5);
  });

  it("should rebuild on update", () => {
    const table = new SparseTable([6, 4, 7, 5, 3, 8, 9, 2]);
    table.update(7, 10);
    expect(table.query(0, 7)).toBe(3);
    expect(table.query(5, 7)).toBe(8);
    table.update(4, 11);
    expect(table.query(0, 7)).toBe(4);
    expect(table.query(4, 5)).toBe(8);
  });
});
