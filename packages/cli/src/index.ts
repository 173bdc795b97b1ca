// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @phase-deuce/cli — Interactive daily log: one generated identity appended
 * per SPACE keypress.
 */

import {
  DailyLogStore,
  PinoConsoleSink,
  type PinoConsoleSinkOptions,
} from "@phase-deuce/daily-log";
import { PersonGenerator } from "@phase-deuce/identity";
import { EXIT_CODES, USAGE_LINE, parseCliArgs, type CliOptions, type ExitCode } from "./options.js";
import { Session } from "./session.js";
import { terminalKeys, type KeyInput } from "./terminal.js";

export {
  CliOptionsSchema,
  EXIT_CODES,
  HELP_TEXT,
  LOG_LEVELS,
  USAGE_LINE,
  parseCliArgs,
} from "./options.js";
export type { CliOptions, CliParseResult, ExitCode } from "./options.js";
export {
  KEY_APPEND,
  KEY_CTRL_C,
  SESSION_MESSAGES,
  Session,
  describePlatform,
  isQuitKey,
} from "./session.js";
export type { EntryWriter, SessionOptions, StatusConsole } from "./session.js";
export { terminalKeys } from "./terminal.js";
export type { KeyInput } from "./terminal.js";

export interface MainIo {
  readonly stdin: KeyInput;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  /** Replaces the pretty-printed console settings. */
  readonly consoleOptions?: PinoConsoleSinkOptions;
}

/**
 * Pretty-printed console on stdout, the way an interactive user reads it.
 */
export function prettyConsoleOptions(options: CliOptions): PinoConsoleSinkOptions {
  return {
    level: options.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname,status",
        messageFormat: "{if status}[ {status} ] {end}{msg}",
        translateTime: "SYS:HH:MM:ss",
        customLevels: "system:55",
        customColors: "system:cyan",
        useOnlyCustomProps: false,
      },
    },
  };
}

/**
 * Run the program for `argv` and resolve to the exit code. Does not exit.
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  io: MainIo = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
): Promise<ExitCode> {
  const parsed = parseCliArgs(argv, env);
  switch (parsed.kind) {
    case "help":
      io.stdout.write(`${parsed.text}\n`);
      return EXIT_CODES.usage;
    case "usage_error":
      io.stderr.write(`${USAGE_LINE}\nphase-deuce: error: ${parsed.message}\n`);
      return EXIT_CODES.usage;
    case "run":
      break;
  }

  const { options } = parsed;
  const console = new PinoConsoleSink(io.consoleOptions ?? prettyConsoleOptions(options));
  const store = new DailyLogStore({
    directory: options.directory,
    ...(options.date !== undefined && { date: options.date }),
    console,
  });
  const identities = new PersonGenerator(
    options.seed !== undefined ? { seed: options.seed } : {},
  );
  return new Session({ store, identities, console }).run(terminalKeys(io.stdin));
}
