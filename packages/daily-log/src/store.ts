// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { createReadStream } from "node:fs";
import { appendFile } from "node:fs/promises";
import { EOL } from "node:os";
import path from "node:path";
import { Transform } from "node:stream";
import { CsvError, parse, type Options as CsvParseOptions } from "csv-parse";
import { encodeRow, filenameFor, verifyRow } from "./codec.js";
import { systemCalendar, systemClock } from "./clock.js";
import { parseStoreConfig } from "./config.js";
import type { ConsoleSink } from "./console.js";
import { formatCsvRow } from "./csv.js";
import { classifyIoError, describeError } from "./errors.js";
import type {
  AppendState,
  Clock,
  DateProvider,
  IdentitySource,
  ValidationOutcome,
} from "./types.js";

/**
 * Options for constructing a DailyLogStore.
 */
export interface DailyLogStoreOptions {
  /** Directory holding the daily files. Defaults to the working directory. */
  readonly directory?: string;
  /** Fixed log date (`YYYY-MM-DD`). Defaults to the calendar's date per call. */
  readonly date?: string;
  /** Receives warnings and errors raised by append and validate. */
  readonly console: ConsoleSink;
  /** Defaults to wall-clock seconds. */
  readonly clock?: Clock;
  /** Defaults to the host's local calendar date. */
  readonly calendar?: DateProvider;
}

/**
 * Owns one append-only CSV file per calendar day.
 *
 * Each row is `unix_time,full_name,email_address,phone_number,checksum`
 * where the checksum is Adler-32 over the first four columns. Every append
 * is followed by a full validation pass over the same file, so corruption
 * surfaces on the first write after it happens.
 *
 * Filesystem failures, and failures while building a row, never escape as
 * exceptions: both operations resolve to a ValidationOutcome.
 *
 * Usage:
 * ```typescript
 * const store = new DailyLogStore({ directory: "logs", console: sink });
 * const outcome = await store.append(new PersonGenerator({ seed: 7 }));
 * if (settleAppend(outcome) === "failed") { ... }
 * ```
 */
export class DailyLogStore {
  private readonly directory: string;
  private readonly date: string | undefined;
  private readonly console: ConsoleSink;
  private readonly clock: Clock;
  private readonly calendar: DateProvider;

  constructor(options: DailyLogStoreOptions) {
    const config = parseStoreConfig({ directory: options.directory, date: options.date });
    this.directory = config.directory;
    this.date = config.date;
    this.console = options.console;
    this.clock = options.clock ?? systemClock;
    this.calendar = options.calendar ?? systemCalendar;
  }

  /**
   * File name for `date`, falling back to the configured date and then to
   * the calendar's current date.
   */
  filenameFor(date?: string): string {
    return filenameFor(date ?? this.date ?? this.calendar.today());
  }

  /**
   * Full path of the file for `date` inside the store's directory.
   */
  pathFor(date?: string): string {
    return path.join(this.directory, this.filenameFor(date));
  }

  /**
   * Append one row for the next identity from `identities`, then validate
   * the whole file.
   *
   * The row and its line terminator go out in a single append-mode write;
   * the file is created when absent. When building or writing the row fails
   * no validation pass runs and the failure is returned directly.
   *
   * @returns The outcome of the post-write validation pass, or the write
   *          failure.
   */
  async append(identities: IdentitySource, date?: string): Promise<ValidationOutcome> {
    const filePath = this.pathFor(date);

    try {
      const timestamp = this.clock.now();
      const identity = identities.next();
      const { fields } = encodeRow(timestamp, identity);
      await appendFile(filePath, formatCsvRow(fields) + EOL, { encoding: "utf8", flag: "a" });
    } catch (error) {
      return this.reportFailure(filePath, error, "append");
    }

    return this.validate(date);
  }

  /**
   * Re-derive the checksum of every row in the file for `date`, in file
   * order, stopping at the first row that does not verify.
   *
   * Rows are streamed; reading stops at the first bad row. A missing file is
   * vacuously valid. Data problems are reported to the console as warnings,
   * operational failures (including bytes that are not UTF-8) as errors.
   */
  async validate(date?: string): Promise<ValidationOutcome> {
    const filePath = this.pathFor(date);
    const source = createReadStream(filePath);
    const decoder = strictUtf8();
    const rows = parse(CSV_READ_OPTIONS);
    source.on("error", (error) => rows.destroy(error));
    decoder.on("error", (error) => rows.destroy(error));
    source.pipe(decoder).pipe(rows);

    let rowIndex = 0;
    try {
      for await (const record of rows) {
        const verdict = verifyRow(toFields(record));
        switch (verdict.status) {
          case "ok":
            break;
          case "corrupt_row":
            return this.reportCorruption(filePath, rowIndex, verdict.reason);
          case "checksum_mismatch":
            this.console.emit(
              "warn",
              `Could not validate all row checksums in ${filePath}: row ${rowIndex + 1} stores ${verdict.stored} but computes ${verdict.computed}`,
            );
            return {
              status: "checksum_mismatch",
              path: filePath,
              rowIndex,
              stored: verdict.stored,
              computed: verdict.computed,
            };
        }
        rowIndex++;
      }
    } catch (error) {
      if (error instanceof CsvError) {
        // The parser may have buffered rows the loop never saw.
        const failedAt =
          "records" in error && typeof error.records === "number" ? error.records : rowIndex;
        return this.reportCorruption(filePath, failedAt, error.message);
      }
      if (classifyIoError(error) === "not_found") {
        return { status: "ok", path: filePath, rowCount: 0 };
      }
      return this.reportFailure(filePath, error, "validate");
    } finally {
      source.destroy();
      decoder.destroy();
    }

    return { status: "ok", path: filePath, rowCount: rowIndex };
  }

  private reportCorruption(filePath: string, rowIndex: number, reason: string): ValidationOutcome {
    this.console.emit(
      "warn",
      `Significant corruption in ${filePath} at row ${rowIndex + 1} (${reason}) -- attempting to write anyway`,
    );
    return { status: "corrupt_row", path: filePath, rowIndex, reason };
  }

  private reportFailure(
    filePath: string,
    error: unknown,
    operation: "append" | "validate",
  ): ValidationOutcome {
    if (classifyIoError(error) === "access_denied") {
      const message = `You do not have permission to access ${filePath}`;
      this.console.emit("error", message);
      return { status: "access_denied", path: filePath, message };
    }
    const message = `Caught exception in DailyLogStore.${operation}(): ${describeError(error)}`;
    this.console.emit("error", message);
    return { status: "general_failure", path: filePath, message };
  }
}

// Rows keep whatever column count they have; verifyRow judges it. Blank
// lines are kept so they surface as corrupt rows.
const CSV_READ_OPTIONS: CsvParseOptions = {
  relax_column_count: true,
  relax_quotes: true,
  skip_empty_lines: false,
};

function toFields(record: unknown): string[] {
  return Array.isArray(record) ? record.map((field: unknown) => String(field)) : [];
}

/**
 * Decode bytes as UTF-8 text, failing on the first invalid sequence
 * instead of substituting U+FFFD.
 */
function strictUtf8(): Transform {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      try {
        callback(null, decoder.decode(chunk, { stream: true }));
      } catch (error) {
        callback(error instanceof Error ? error : new Error(describeError(error)));
      }
    },
    flush(callback) {
      try {
        callback(null, decoder.decode());
      } catch (error) {
        callback(error instanceof Error ? error : new Error(describeError(error)));
      }
    },
  });
}

/**
 * Collapse an append outcome into its terminal state.
 */
export function settleAppend(outcome: ValidationOutcome): AppendState {
  switch (outcome.status) {
    case "ok":
      return "ok";
    case "checksum_mismatch":
    case "corrupt_row":
      return "warned";
    case "access_denied":
    case "general_failure":
      return "failed";
  }
}

/**
 * True when the outcome means the entry was not recorded, or its file could
 * not be read back.
 */
export function isWriteFailure(outcome: ValidationOutcome): boolean {
  return settleAppend(outcome) === "failed";
}
