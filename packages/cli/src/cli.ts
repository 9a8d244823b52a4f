#!/usr/bin/env -S npx tsx

/**
 * rangemin CLI entry point
 */

import { CommanderError, InvalidArgumentError } from "commander";
import { createProgram, type GlobalOptions } from "./program.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";

const program = createProgram();

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed parse errors, help and version output
    const reported = err instanceof CommanderError && !(err instanceof InvalidArgumentError);
    if (!reported) {
      const opts = program.opts<GlobalOptions>();
      console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    }

    process.exit(mapErrorToExitCode(err));
  }
}

void main();
