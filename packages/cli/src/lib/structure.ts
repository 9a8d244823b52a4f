/**
 * Structure adapter for CLI
 * Adds timing when verbose diagnostics are on
 */

import {
  createInstrumented,
  createRangeMinimum,
  type RangeMinimum,
  type StrategyName,
} from "@rangemin/sdk";
import { isVerbose } from "./env.js";

/**
 * Build a structure for a CLI command
 */
export function openStructure(strategy: StrategyName, values: readonly number[]): RangeMinimum {
  return isVerbose() ? createInstrumented(strategy, values) : createRangeMinimum(strategy, values);
}
