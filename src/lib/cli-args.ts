/**
 * @fileoverview Minimal `--flag value` parsing for the run scripts.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.ts";

/**
 * Collect `--name value` pairs and bare `--name` switches.
 *
 * @example
 * parseFlags(["--start", "2024-06-01", "--models"]) // returns { start: "2024-06-01", models: "true" }
 */
export function parseFlags(argv: readonly string[]): Record<string, string> {
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const name = arg.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      flags[name] = "true";
    } else {
      flags[name] = next;
      i++;
    }
  }
  return flags;
}

/**
 * Parse argv against a schema, throwing ConfigurationError with every issue.
 */
export function parseArgs<T extends z.ZodTypeAny>(argv: readonly string[], schema: T): z.output<T> {
  const result = schema.safeParse(parseFlags(argv));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  --${issue.path.join(".") || "(args)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid arguments:\n${issues}`);
  }
  return result.data;
}
