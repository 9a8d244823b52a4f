/**
 * Linear-scan baseline
 *
 * Time complexity:
 * - Build: O(N) copy
 * - Update: O(1)
 * - Query: O(r - l + 1)
 */

import { RangeMinimumBase } from "./base.js";

/**
 * Keeps no auxiliary state; serves as the correctness oracle for the other strategies
 */
export class NaiveRangeMinimum extends RangeMinimumBase {
  readonly strategy = "naive";

  constructor(values: readonly number[]) {
    super(values);
    this.logBuild();
  }

  protected applyUpdate(index: number, value: number): void {
    this.values[index] = value;
  }

  protected rangeMin(left: number, right: number): number {
    let current = Infinity;
    for (let i = left; i <= right; i++) {
      if (this.values[i] < current) {
        current = this.values[i];
      }
    }
    return current;
  }
}
