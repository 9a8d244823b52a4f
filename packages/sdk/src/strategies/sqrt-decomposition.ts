/**
 * Square-root decomposition
 *
 * The sequence is split into ceil(N / B) blocks of B = ceil(sqrt(N)) elements,
 * and `feed[b]` caches the minimum of block b.
 *
 * Time complexity:
 * - Build: O(N)
 * - Update: O(√N) (the owning block is rescanned)
 * - Query: O(√N)
 */

import { validateIndex } from "../validation.js";
import { RangeMinimumBase } from "./base.js";

export class SqrtDecomposition extends RangeMinimumBase {
  readonly strategy = "sqrt";

  /** Elements per block */
  readonly blockSize: number;

  /** Minimum of each block */
  private readonly feed: Float64Array;

  constructor(values: readonly number[]) {
    super(values);
    this.blockSize = Math.ceil(Math.sqrt(this.size));
    this.feed = new Float64Array(Math.ceil(this.size / this.blockSize)).fill(Infinity);

    for (let i = 0; i < this.size; i++) {
      const block = Math.floor(i / this.blockSize);
      this.feed[block] = Math.min(this.feed[block], this.values[i]);
    }

    this.logBuild({ blockSize: this.blockSize, blocks: this.feed.length });
  }

  /**
   * Number of blocks
   */
  get blockCount(): number {
    return this.feed.length;
  }

  /**
   * Cached minimum of a block
   * @throws IndexOutOfBoundsError when `block` is outside [0, blockCount)
   */
  blockMin(block: number): number {
    validateIndex(block, this.feed.length);
    return this.feed[block];
  }

  protected applyUpdate(index: number, value: number): void {
    this.values[index] = value;

    // Rescan rather than fold: folding min(feed, value) can never raise a stale minimum
    const block = Math.floor(index / this.blockSize);
    const start = block * this.blockSize;
    const end = Math.min(start + this.blockSize, this.size);
    let current = Infinity;
    for (let i = start; i < end; i++) {
      current = Math.min(current, this.values[i]);
    }
    this.feed[block] = current;
  }

  protected rangeMin(left: number, right: number): number {
    let current = Infinity;
    let i = left;

    // Leading partial block
    while (i < right && i % this.blockSize !== 0) {
      current = Math.min(current, this.values[i]);
      i++;
    }

    // Whole blocks
    while (i + this.blockSize <= right) {
      current = Math.min(current, this.feed[i / this.blockSize]);
      i += this.blockSize;
    }

    // Trailing partial block
    while (i <= right) {
      current = Math.min(current, this.values[i]);
      i++;
    }

    return current;
  }
}
