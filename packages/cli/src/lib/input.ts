/**
 * Zod schemas and loaders for sequence and operation-script input
 */

import { z } from "zod";
import { InvalidArgumentError } from "commander";
import type { Operation } from "@rangemin/sdk";
import { parseJson } from "./arg.js";
import { isStdinTTY, readJsonFromFile, readStdin } from "./io.js";
import { CliError } from "./errors.js";

// Emptiness and index checks are left to the structures so they report their own error codes
const SequenceSchema = z.array(z.number({ invalid_type_error: "elements must be numbers" }), {
  invalid_type_error: "sequence must be a JSON array of numbers",
});

const UpdateOperationSchema = z.object({
  op: z.literal("update"),
  index: z.number(),
  value: z.number(),
});

const QueryOperationSchema = z.object({
  op: z.literal("query"),
  left: z.number(),
  right: z.number(),
});

const OperationSchema = z.discriminatedUnion("op", [
  UpdateOperationSchema,
  QueryOperationSchema,
]);

const OperationScriptSchema = z.array(OperationSchema, {
  invalid_type_error: "operation script must be a JSON array",
});

/**
 * Where a JSON payload comes from
 */
export interface JsonSource {
  /** Path of a JSON file */
  file?: string;
  /** Inline JSON */
  data?: string;
}

/**
 * Read a JSON payload from a file, inline data, or stdin
 * @param source - File and inline options (mutually exclusive)
 * @param label - Option names for error messages
 */
export async function readJsonInput(
  source: JsonSource,
  label: { file: string; data: string }
): Promise<unknown> {
  if (source.file !== undefined && source.data !== undefined) {
    throw new InvalidArgumentError(
      `Cannot use both ${label.file} and ${label.data}; choose one or use stdin`
    );
  }

  if (source.file !== undefined) {
    return await readJsonFromFile(source.file);
  }
  if (source.data !== undefined) {
    return parseJson(source.data, label.data);
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError(
      `No input provided. Use ${label.file}, ${label.data}, or pipe JSON to stdin`
    );
  }
  let stdin: string;
  try {
    stdin = await readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new InvalidArgumentError(
      err instanceof Error ? err.message : "Failed to read from stdin"
    );
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}

/**
 * Validate raw JSON against a schema, turning issues into a CliError
 */
export function parseWith<T>(schema: z.ZodType<T>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ` : "") + issue.message)
      .join("; ");
    throw new CliError(`Invalid ${what}: ${issues}`);
  }
  return result.data;
}

/**
 * Load the sequence to build a structure from
 */
export async function loadSequence(source: JsonSource): Promise<number[]> {
  const raw = await readJsonInput(source, { file: "--file", data: "--data" });
  return parseWith(SequenceSchema, raw, "sequence");
}

/**
 * Load an operation script
 */
export async function loadOperations(source: JsonSource): Promise<Operation[]> {
  const raw = await readJsonInput(source, { file: "--ops", data: "--ops-data" });
  return parseWith(OperationScriptSchema, raw, "operation script");
}
