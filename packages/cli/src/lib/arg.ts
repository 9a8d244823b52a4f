/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isStrategyName, STRATEGY_NAMES, type StrategyName } from "@rangemin/sdk";

/**
 * Parse an integer argument
 *
 * Negative values are accepted here so the structure reports them as out of
 * bounds; on the command line they must follow `--` (`query -- -1 3`).
 */
export function parseInteger(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be an integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Parse a strategy name
 */
export function parseStrategy(value: string, name = "--strategy"): StrategyName {
  const trimmed = value.trim().toLowerCase();

  if (!isStrategyName(trimmed)) {
    throw new InvalidArgumentError(
      `${name} must be one of: ${STRATEGY_NAMES.join(", ")} (got "${value}")`
    );
  }

  return trimmed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
