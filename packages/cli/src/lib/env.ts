/**
 * Environment and configuration resolution
 */

import { DEFAULT_STRATEGY, type StrategyName } from "@rangemin/sdk";
import { parseStrategy } from "./arg.js";

let verboseFlag = false;

/**
 * Resolve the strategy to use
 * Priority: CLI option > RANGEMIN_STRATEGY env var > SDK default
 * @throws InvalidArgumentError if RANGEMIN_STRATEGY names no strategy
 */
export function resolveStrategy(cliStrategy?: StrategyName): StrategyName {
  if (cliStrategy !== undefined) {
    return cliStrategy;
  }

  const fromEnv = process.env.RANGEMIN_STRATEGY;
  if (fromEnv !== undefined && fromEnv.trim() !== "") {
    return parseStrategy(fromEnv, "RANGEMIN_STRATEGY");
  }

  return DEFAULT_STRATEGY;
}

/**
 * Turn verbose diagnostics on or off for this process (set from --verbose)
 */
export function setVerbose(enabled: boolean): void {
  verboseFlag = enabled;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return verboseFlag || process.env.RANGEMIN_CLI_DEBUG === "1";
}
