/**
 * Answer a single range-minimum query
 */

import type { Command } from "commander";
import { parseInteger } from "../lib/arg.js";
import { resolveStrategy } from "../lib/env.js";
import { loadSequence } from "../lib/input.js";
import { openStructure } from "../lib/structure.js";
import { formatNumber, printJson } from "../lib/render.js";
import { emitStrategyMetrics, withTiming } from "../lib/telemetry.js";
import type { GlobalOptions } from "../program.js";

interface QueryOptions {
  file?: string;
  data?: string;
  json?: boolean;
}

export function registerQueryCommand(program: Command): void {
  program
    .command("query <left> <right>")
    .description("Print the minimum of the inclusive range [left, right]")
    .option("--file <path>", "Read the sequence from a JSON file")
    .option("--data <json>", "Inline JSON sequence")
    .option("--json", "Output as JSON")
    .addHelpText(
      "after",
      `
Bounds are zero-based and inclusive. Put them after \`--\` when one is negative.

Examples:
  $ rangemin query 1 3 --data '[5,3,8,2,7]'
  $ echo '[5,3,8,2,7]' | rangemin --strategy sparse query 0 4
  $ rangemin query --file seq.json -- -1 3`
    )
    .action(async (left: string, right: string, options: QueryOptions) => {
      await withTiming("cli.query", async () => {
        const opts = program.opts<GlobalOptions>();
        const l = parseInteger(left, "left");
        const r = parseInteger(right, "right");
        const strategy = resolveStrategy(opts.strategy);

        const values = await loadSequence(options);
        const structure = openStructure(strategy, values);
        const min = structure.query(l, r);
        emitStrategyMetrics(strategy);

        if (options.json) {
          printJson({ strategy, left: l, right: r, min }, { raw: true });
        } else {
          console.log(formatNumber(min));
        }
      });
    });
}
