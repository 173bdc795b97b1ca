// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { parseArgs } from "node:util";
import { z } from "zod";
import {
  CONSOLE_LEVELS,
  InvalidConfigError,
  IsoDateSchema,
  describeError,
  parseWithSchema,
} from "@phase-deuce/daily-log";

/** Process exit codes. */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  usage: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const LOG_LEVELS = [...CONSOLE_LEVELS, "silent"] as const;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the options of one interactive session.
 */
export const CliOptionsSchema = z.object({
  /** Log date. Omitted means the local calendar date at each append. */
  date: IsoDateSchema.optional(),
  directory: z.string().min(1).default("."),
  /** Identity seed. Omitted means a fresh random seed. */
  seed: z
    .string()
    .regex(/^-?\d+$/, "must be an integer")
    .transform(Number)
    .optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

export type CliParseResult =
  | { readonly kind: "run"; readonly options: CliOptions }
  | { readonly kind: "help"; readonly text: string }
  | { readonly kind: "usage_error"; readonly message: string };

export const USAGE_LINE = "Usage: phase-deuce [-h] [-d YYYY-MM-DD] [-o DIR] [-s SEED] [-l LEVEL]";

export const HELP_TEXT = [
  USAGE_LINE,
  "",
  "Welcome to the daily log. Press SPACE to append a generated identity to",
  "the day's log file; every append re-validates the whole file.",
  "",
  "Options:",
  "  -d, --date <YYYY-MM-DD>   The desired logfile date in ISO 8601 format (YYYY-MM-DD)",
  "  -o, --dir <directory>     Directory holding the daily log files (default: .)",
  "  -s, --seed <integer>      Seed for a reproducible sequence of identities",
  `  -l, --log-level <level>   One of ${LOG_LEVELS.join(", ")} (default: $LOG_LEVEL or info)`,
  "  -h, --help                Show this help and exit",
].join("\n");

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * `LOG_LEVEL` from `env` is used when `--log-level` is absent. Never throws
 * for bad input; malformed or invalid arguments come back as `usage_error`.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliParseResult {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { kind: "usage_error", message: describeError(error) };
  }
  const { values } = parsed;

  if (values.help === true) {
    return { kind: "help", text: HELP_TEXT };
  }

  try {
    const options = parseWithSchema(CliOptionsSchema, {
      date: values.date,
      directory: values.dir,
      seed: values.seed,
      logLevel: (values["log-level"] ?? env["LOG_LEVEL"])?.toLowerCase(),
    });
    return { kind: "run", options };
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      return { kind: "usage_error", message: error.details.join("; ") };
    }
    throw error;
  }
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      date: { type: "string", short: "d" },
      dir: { type: "string", short: "o" },
      seed: { type: "string", short: "s" },
      "log-level": { type: "string", short: "l" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  });
}
