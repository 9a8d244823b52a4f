/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { RangeMinError } from "@rangemin/sdk";

/**
 * Exit codes
 * - 0: success
 * - 1: usage/IO/unknown error
 * - 2: structure rejected the input or an operation
 * - 3: strategies disagreed on a result
 */
export const EXIT_FAILURE = 1;
export const EXIT_STRUCTURE_ERROR = 2;
export const EXIT_DISAGREEMENT = 3;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map SDK and commander errors to CLI exit codes
 */
export function mapErrorToExitCode(error: unknown): number {
  // CliError and commander errors carry their own exit code
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof RangeMinError) {
    return EXIT_STRUCTURE_ERROR;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof RangeMinError) {
      message = `[${error.code}] ${message}`;
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
