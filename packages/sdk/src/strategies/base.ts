/**
 * Shared scaffolding for range-minimum strategies
 */

import type { RangeMinimum, StrategyName } from "../types.js";
import {
  validateIndex,
  validateRange,
  validateSequence,
  validateUpdate,
} from "../validation.js";
import { logger, type LogEntry } from "../observability/logs.js";

/**
 * Base class that owns the sequence and runs validation before delegating.
 *
 * Subclasses only see arguments that already passed the shared checks, so
 * `applyUpdate` and `rangeMin` never observe an invalid call.
 */
export abstract class RangeMinimumBase implements RangeMinimum {
  abstract readonly strategy: StrategyName;

  /** Owned copy of the sequence */
  protected readonly values: Float64Array;

  constructor(values: readonly number[]) {
    this.values = validateSequence(values);
  }

  get size(): number {
    return this.values.length;
  }

  update(index: number, value: number): void {
    validateUpdate(index, value, this.size);
    this.applyUpdate(index, value);
  }

  query(left: number, right: number): number {
    validateRange(left, right, this.size);
    return this.rangeMin(left, right);
  }

  at(index: number): number {
    validateIndex(index, this.size);
    return this.values[index];
  }

  toArray(): number[] {
    return Array.from(this.values);
  }

  /**
   * Log construction once the subclass has built its index
   */
  protected logBuild(details?: LogEntry["details"]): void {
    logger.debug("structure.build", { strategy: this.strategy, size: this.size }, details);
  }

  protected abstract applyUpdate(index: number, value: number): void;

  protected abstract rangeMin(left: number, right: number): number;
}
