/**
 * Randomized agreement with a brute-force scan
 */

import { describe, it, expect } from "vitest";
import { SeededRandom, randomSequence } from "@rangemin/testkit";
import { STRATEGY_NAMES, createRangeMinimum } from "./registry.js";

function bruteForceMin(values: number[], left: number, right: number): number {
  return Math.min(...values.slice(left, right + 1));
}

describe("randomized properties", () => {
  const sizes = [1, 2, 3, 7, 16, 17, 31, 64, 100];

  describe.each(STRATEGY_NAMES)("%s strategy", (strategy) => {
    it.each(sizes)("should match a direct scan under interleaved updates (N=%i)", (size) => {
      const rng = new SeededRandom(size * 7919);
      const mirror = randomSequence(rng, size);
      const rmq = createRangeMinimum(strategy, mirror);

      for (let step = 0; step < 200; step++) {
        if (rng.next() < 0.4) {
          const index = rng.int(0, size - 1);
          const value = rng.float(-1000, 1000);
          rmq.update(index, value);
          mirror[index] = value;
        } else {
          const [left, right] = rng.range(size);
          expect(rmq.query(left, right)).toBe(bruteForceMin(mirror, left, right));
        }
      }

      expect(rmq.toArray()).toEqual(mirror);
    });

    it("should answer every range correctly on integer data with repeats", () => {
      const rng = new SeededRandom(42);
      const values = Array.from({ length: 23 }, () => rng.int(1, 5));
      const rmq = createRangeMinimum(strategy, values);

      for (let left = 0; left < values.length; left++) {
        for (let right = left; right < values.length; right++) {
          expect(rmq.query(left, right)).toBe(bruteForceMin(values, left, right));
        }
      }
    });
  });

  it("should return identical answers across strategies", () => {
    const rng = new SeededRandom(2024);
    const values = randomSequence(rng, 50);
    const structures = STRATEGY_NAMES.map((name) => createRangeMinimum(name, values));

    for (let step = 0; step < 100; step++) {
      if (step % 5 === 0) {
        const index = rng.int(0, 49);
        const value = rng.float(-1000, 1000);
        structures.forEach((s) => s.update(index, value));
      }
      const [left, right] = rng.range(50);
      const answers = structures.map((s) => s.query(left, right));
      expect(new Set(answers).size).toBe(1);
    }
  });

  it("should keep sorted ascending and descending inputs consistent", () => {
    const ascending = Array.from({ length: 40 }, (_, i) => -1000 + i * 50);
    const descending = [...ascending].reverse();

    for (const name of STRATEGY_NAMES) {
      const up = createRangeMinimum(name, ascending);
      const down = createRangeMinimum(name, descending);
      expect(up.query(10, 30)).toBe(-500);
      expect(down.query(10, 30)).toBe(-1000 + 9 * 50);
    }
  });
});
