// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";

/**
 * Levels accepted by a console sink. `system` reports the outcome of an
 * application-level step and ranks above `error`.
 */
export const CONSOLE_LEVELS = ["debug", "info", "warn", "error", "system"] as const;

export type ConsoleLevel = (typeof CONSOLE_LEVELS)[number];

export type ConsoleThreshold = ConsoleLevel | "silent";

/** Numeric pino value of the custom `system` level. */
export const SYSTEM_LEVEL_VALUE = 55;

/**
 * Leveled text output. Fire-and-forget: implementations must not throw and
 * callers never wait on them.
 */
export interface ConsoleSink {
  emit(level: ConsoleLevel, message: string): void;
}

export interface PinoConsoleSinkOptions {
  /** Minimum level written. Defaults to `info`. */
  readonly level?: ConsoleThreshold;
  /** Logger name attached to every entry. */
  readonly name?: string;
  /** Where entries go. Defaults to stdout. */
  readonly destination?: DestinationStream;
  /** pino transport, used instead of `destination` when given. */
  readonly transport?: LoggerOptions["transport"];
}

/**
 * Console sink backed by a pino logger with an extra `system` level.
 *
 * ```ts
 * const sink = new PinoConsoleSink({ level: "debug" });
 * sink.emit("warn", "Could not validate all row checksums");
 * sink.status(true, "Application startup");
 * ```
 */
export class PinoConsoleSink implements ConsoleSink {
  readonly logger: Logger<"system">;

  constructor(options: PinoConsoleSinkOptions = {}) {
    const loggerOptions: LoggerOptions<"system"> = {
      level: options.level ?? "info",
      customLevels: { system: SYSTEM_LEVEL_VALUE },
      base: options.name !== undefined ? { name: options.name } : null,
      ...(options.transport !== undefined && { transport: options.transport }),
    };
    this.logger =
      options.transport === undefined && options.destination !== undefined
        ? pino(loggerOptions, options.destination)
        : pino(loggerOptions);
  }

  emit(level: ConsoleLevel, message: string): void {
    this.logger[level](message);
  }

  /**
   * Report a step as `[ OK ]` or `[ FAIL ]` at the `system` level.
   */
  status(ok: boolean, message: string): void {
    this.logger.system({ status: ok ? "OK" : "FAIL" }, message);
  }
}

export interface RecordedEntry {
  readonly level: ConsoleLevel;
  readonly message: string;
}

/**
 * In-memory sink that keeps every entry. Useful in tests and for callers
 * that want to inspect what a store reported.
 */
export function createRecordingSink(): ConsoleSink & { readonly entries: RecordedEntry[] } {
  const entries: RecordedEntry[] = [];
  return {
    entries,
    emit(level: ConsoleLevel, message: string): void {
      entries.push({ level, message });
    },
  };
}
