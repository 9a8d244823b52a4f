/**
 * Command tree for the rangemin CLI
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { StrategyName } from "@rangemin/sdk";
import { parseStrategy } from "./lib/arg.js";
import { setVerbose } from "./lib/env.js";
import { colorize } from "./lib/render.js";
import { registerStrategiesCommand } from "./commands/strategies.js";
import { registerQueryCommand } from "./commands/query.js";
import { registerRunCommand } from "./commands/run.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Options accepted before any command
 */
export interface GlobalOptions {
  strategy?: StrategyName;
  verbose?: boolean;
  quiet?: boolean;
}

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  return z.object({ version: z.string() }).parse(raw).version;
}

/**
 * Build the CLI program
 *
 * Errors (including usage errors) are thrown from `parseAsync` rather than
 * exiting, so the caller decides the exit code.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("rangemin")
    .description("Range-minimum queries over a mutable sequence")
    .version(readVersion())
    .option(
      "--strategy <name>",
      "naive | sqrt | segment | sparse (default: $RANGEMIN_STRATEGY or segment)",
      (value: string) => parseStrategy(value)
    )
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", (thisCommand) => {
      setVerbose(Boolean(thisCommand.opts<GlobalOptions>().verbose));
    });

  registerStrategiesCommand(program);
  registerQueryCommand(program);
  registerRunCommand(program);

  return program;
}
