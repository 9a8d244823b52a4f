/**
 * Replay an operation script against one or every strategy
 */

import { InvalidArgumentError, type Command } from "commander";
import { STRATEGY_NAMES, runOperations, type StrategyName } from "@rangemin/sdk";
import { resolveStrategy } from "../lib/env.js";
import { loadOperations, loadSequence } from "../lib/input.js";
import { openStructure } from "../lib/structure.js";
import { colorize, formatNumber, printJson, printLines } from "../lib/render.js";
import { CliError, EXIT_DISAGREEMENT } from "../lib/errors.js";
import { emitStrategyMetrics, withTiming } from "../lib/telemetry.js";
import type { GlobalOptions } from "../program.js";

interface RunOptions {
  file?: string;
  data?: string;
  ops?: string;
  opsData?: string;
  all?: boolean;
  json?: boolean;
}

/**
 * Index of the first result that differs, or -1
 */
export function firstMismatch(expected: number[], actual: number[]): number {
  const length = Math.max(expected.length, actual.length);
  for (let i = 0; i < length; i++) {
    if (expected[i] !== actual[i]) {
      return i;
    }
  }
  return -1;
}

/**
 * Results of replaying one script against one strategy
 */
export interface StrategyOutcome {
  strategy: StrategyName;
  results: number[];
}

/**
 * Compare every outcome against the first (the naive oracle under --all)
 * @returns The first outcome
 * @throws CliError with exit code 3 on the first disagreement
 */
export function assertAgreement(outcomes: StrategyOutcome[]): StrategyOutcome {
  const [reference, ...others] = outcomes;
  if (reference === undefined) {
    throw new CliError("No strategy was run");
  }

  for (const { strategy, results } of others) {
    const at = firstMismatch(reference.results, results);
    if (at !== -1) {
      throw new CliError(
        `Strategy "${strategy}" disagrees with "${reference.strategy}" at query ${at}: ` +
          `${String(results[at])} != ${String(reference.results[at])}`,
        { exitCode: EXIT_DISAGREEMENT }
      );
    }
  }

  return reference;
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Apply a JSON script of updates and queries, printing each query result")
    .option("--file <path>", "Read the sequence from a JSON file")
    .option("--data <json>", "Inline JSON sequence")
    .option("--ops <path>", "Read the operation script from a JSON file")
    .option("--ops-data <json>", "Inline JSON operation script")
    .option("--all", "Run every strategy and check that they agree")
    .option("--json", "Output as JSON")
    .addHelpText(
      "after",
      `
Operations:
  {"op":"update","index":3,"value":10}
  {"op":"query","left":0,"right":4}

Examples:
  $ rangemin run --data '[5,3,8,2,7]' --ops-data '[{"op":"query","left":1,"right":3}]'
  $ rangemin run --file seq.json --ops ops.json --all`
    )
    .action(async (options: RunOptions) => {
      await withTiming("cli.run", async () => {
        const opts = program.opts<GlobalOptions>();

        if (options.ops === undefined && options.opsData === undefined) {
          throw new InvalidArgumentError("Provide the operation script with --ops or --ops-data");
        }
        if (options.all && opts.strategy !== undefined) {
          throw new InvalidArgumentError("Cannot use --all with --strategy");
        }

        const values = await loadSequence(options);
        const operations = await loadOperations({ file: options.ops, data: options.opsData });

        const strategies: readonly StrategyName[] = options.all
          ? STRATEGY_NAMES
          : [resolveStrategy(opts.strategy)];

        const outcomes = strategies.map((strategy): StrategyOutcome => {
          const results = runOperations(openStructure(strategy, values), operations);
          emitStrategyMetrics(strategy);
          return { strategy, results };
        });

        const reference = assertAgreement(outcomes);

        if (options.json) {
          printJson(
            { strategies: outcomes.map((o) => o.strategy), results: reference.results },
            { raw: true }
          );
          return;
        }

        printLines(reference.results.map(formatNumber));
        if (options.all && !opts.quiet) {
          console.error(
            colorize(`✓ All ${outcomes.length} strategies agree`, "green", process.stderr)
          );
        }
      });
    });
}
