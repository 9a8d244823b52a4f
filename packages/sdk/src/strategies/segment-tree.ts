/**
 * Segment tree over a flat buffer
 *
 * Node k covers a contiguous range; its children live at 2k+1 and 2k+2.
 * The buffer holds 4N slots, which bounds the recursion for any N.
 * Unused slots stay at +Infinity, the identity for min.
 *
 * ```
 *            [0: 0..4]
 *           /         \
 *     [1: 0..2]     [2: 3..4]
 *      /     \        /    \
 *  [3: 0..1] [4: 2] [5: 3] [6: 4]
 *    /   \
 * [7: 0] [8: 1]
 * ```
 *
 * Time complexity:
 * - Build: O(N)
 * - Update: O(log N)
 * - Query: O(log N)
 */

import { RangeMinimumBase } from "./base.js";

export class SegmentTree extends RangeMinimumBase {
  readonly strategy = "segment";

  /** Node minima, indexed by node number */
  private readonly tree: Float64Array;

  constructor(values: readonly number[]) {
    super(values);
    this.tree = new Float64Array(4 * this.size).fill(Infinity);
    this.build(0, 0, this.size - 1);
    this.logBuild({ nodes: this.tree.length });
  }

  /**
   * Minimum of the whole sequence, read from the root
   */
  get root(): number {
    return this.tree[0];
  }

  private build(node: number, start: number, end: number): void {
    if (start === end) {
      this.tree[node] = this.values[start];
      return;
    }

    const mid = Math.floor((start + end) / 2);
    this.build(2 * node + 1, start, mid);
    this.build(2 * node + 2, mid + 1, end);
    this.tree[node] = Math.min(this.tree[2 * node + 1], this.tree[2 * node + 2]);
  }

  protected applyUpdate(index: number, value: number): void {
    this.updateNode(0, 0, this.size - 1, index, value);
  }

  private updateNode(node: number, start: number, end: number, index: number, value: number): void {
    if (start === end) {
      this.values[index] = value;
      this.tree[node] = value;
      return;
    }

    const mid = Math.floor((start + end) / 2);
    if (index <= mid) {
      this.updateNode(2 * node + 1, start, mid, index, value);
    } else {
      this.updateNode(2 * node + 2, mid + 1, end, index, value);
    }
    this.tree[node] = Math.min(this.tree[2 * node + 1], this.tree[2 * node + 2]);
  }

  protected rangeMin(left: number, right: number): number {
    return this.queryNode(0, 0, this.size - 1, left, right);
  }

  private queryNode(node: number, start: number, end: number, left: number, right: number): number {
    // Disjoint
    if (right < start || end < left) {
      return Infinity;
    }

    // Fully contained
    if (left <= start && end <= right) {
      return this.tree[node];
    }

    // Partial overlap
    const mid = Math.floor((start + end) / 2);
    return Math.min(
      this.queryNode(2 * node + 1, start, mid, left, right),
      this.queryNode(2 * node + 2, mid + 1, end, left, right)
    );
  }
}
