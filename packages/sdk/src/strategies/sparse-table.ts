/**
 * Sparse table (binary lifting)
 *
 * Level j stores the minimum of every window of length 2^j. A query covers
 * [left, right] with two windows of the largest fitting power of two; the
 * windows may overlap, which min tolerates.
 *
 * The table is static. An update rewrites the element and rebuilds every
 * level, so this strategy suits query-heavy workloads only.
 *
 * Time complexity:
 * - Build: O(N log N)
 * - Update: O(N log N)
 * - Query: O(1)
 */

import { RangeMinimumBase } from "./base.js";
import { logger } from "../observability/logs.js";

export class SparseTable extends RangeMinimumBase {
  readonly strategy = "sparse";

  /** lt[k] = floor(log2(k)) for k in [0, N] */
  private readonly lt: Uint8Array;

  /** st[j][i] = min of values[i .. i + 2^j - 1] */
  private readonly st: Float64Array[];

  constructor(values: readonly number[]) {
    super(values);

    this.lt = new Uint8Array(this.size + 1);
    for (let k = 2; k <= this.size; k++) {
      this.lt[k] = this.lt[k >> 1] + 1;
    }

    const levels = this.lt[this.size] + 1;
    this.st = Array.from({ length: levels }, (_, j) =>
      new Float64Array(this.size - (1 << j) + 1).fill(Infinity)
    );

    this.build();
    this.logBuild({ levels });
  }

  /**
   * Number of power-of-two levels, floor(log2 N) + 1
   */
  get levels(): number {
    return this.st.length;
  }

  private build(): void {
    this.st[0].set(this.values);

    for (let j = 1; j < this.st.length; j++) {
      const half = 1 << (j - 1);
      const prev = this.st[j - 1];
      const level = this.st[j];
      for (let i = 0; i + (1 << j) <= this.size; i++) {
        level[i] = Math.min(prev[i], prev[i + half]);
      }
    }
  }

  protected applyUpdate(index: number, value: number): void {
    this.values[index] = value;
    this.build();
    logger.debug("structure.rebuild", { strategy: this.strategy, size: this.size }, { index });
  }

  protected rangeMin(left: number, right: number): number {
    const j = this.lt[right - left + 1];
    const level = this.st[j];
    return Math.min(level[left], level[right - (1 << j) + 1]);
  }
}
