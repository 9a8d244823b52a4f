/**
 * Structured logging for structure lifecycle events
 */

import type { StrategyName } from "../types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Lifecycle events a structure reports */
export type StructureEvent = "structure.build" | "structure.rebuild";

/** The structure an event belongs to */
export interface StructureRef {
  strategy: StrategyName;
  size: number;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: StructureEvent;
  structure?: StructureRef;
  /** Strategy-specific shape of the index (block size, levels, touched index) */
  details?: Record<string, string | number | boolean>;
}

/**
 * Render an entry as one line: `[ts] [LEVEL] [event] strategy n=size key=value ...`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.structure) {
    parts.push(entry.structure.strategy, `n=${entry.structure.size}`);
  }
  for (const [key, value] of Object.entries(entry.details ?? {})) {
    parts.push(`${key}=${String(value)}`);
  }

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(
    level: LogLevel,
    event: StructureEvent,
    structure?: StructureRef,
    details?: LogEntry["details"]
  ): void {
    if (!this.#enabled) return;
    // Debug output is opt-in
    if (level === "debug" && !process.env.RANGEMIN_DEBUG) return;

    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      event,
      structure,
      details,
    });

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: StructureEvent, structure?: StructureRef, details?: LogEntry["details"]): void {
    this.log("debug", event, structure, details);
  }

  info(event: StructureEvent, structure?: StructureRef, details?: LogEntry["details"]): void {
    this.log("info", event, structure, details);
  }

  warn(event: StructureEvent, structure?: StructureRef, details?: LogEntry["details"]): void {
    this.log("warn", event, structure, details);
  }

  error(event: StructureEvent, structure?: StructureRef, details?: LogEntry["details"]): void {
    this.log("error", event, structure, details);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
