/**
 * Replay a script of updates and queries against a structure
 */

import type { Operation, RangeMinimum } from "./types.js";

/**
 * Apply operations in order
 * @param structure - Target structure (mutated by updates)
 * @param operations - Script to replay
 * @returns Result of every query, in script order
 */
export function runOperations(structure: RangeMinimum, operations: readonly Operation[]): number[] {
  const results: number[] = [];
  for (const operation of operations) {
    switch (operation.op) {
      case "update":
        structure.update(operation.index, operation.value);
        break;
      case "query":
        results.push(structure.query(operation.left, operation.right));
        break;
    }
  }
  return results;
}
