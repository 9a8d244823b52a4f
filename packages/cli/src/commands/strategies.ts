/**
 * List the available strategies
 */

import type { Command } from "commander";
import { STRATEGIES, STRATEGY_NAMES } from "@rangemin/sdk";
import { formatColumns, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export function registerStrategiesCommand(program: Command): void {
  program
    .command("strategies")
    .description("List strategies and their complexity")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.strategies", async () => {
        const descriptors = STRATEGY_NAMES.map((name) => STRATEGIES[name]);

        if (options.json) {
          printJson(
            descriptors.map(({ name, title, description, complexity }) => ({
              name,
              title,
              description,
              complexity,
            }))
          );
          return;
        }

        const rows = [
          ["NAME", "BUILD", "UPDATE", "QUERY", "SPACE", "TITLE"],
          ...descriptors.map(({ name, title, complexity }) => [
            name,
            complexity.build,
            complexity.update,
            complexity.query,
            complexity.space,
            title,
          ]),
        ];
        printLines(formatColumns(rows));
      });
    });
}
