// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @phase-deuce/daily-log — Append-only daily CSV log with per-row Adler-32
 * checksums and a validation pass after every write.
 *
 * Public API surface:
 *
 *   Classes:
 *     DailyLogStore   — append(), validate(), filenameFor(), pathFor()
 *     PinoConsoleSink — pino-backed ConsoleSink with a `system` level
 *
 *   Functions:
 *     encodeRow, verifyRow, computeChecksum, adler32, filenameFor
 *     formatCsvRow, escapeCsvField
 *     settleAppend, isWriteFailure, classifyIoError
 *     parseStoreConfig, parseWithSchema, isIsoDate
 *     createRecordingSink, localIsoDate, fixedClock, fixedCalendar
 *
 *   Types:
 *     Identity, IdentitySource, RowFields, EncodedRow, RowVerdict,
 *     ValidationOutcome, AppendState, Clock, DateProvider, IoErrorKind,
 *     ConsoleSink, ConsoleLevel, StoreConfig, DailyLogStoreOptions
 */

// Store
export { DailyLogStore, settleAppend, isWriteFailure } from "./store.js";
export type { DailyLogStoreOptions } from "./store.js";

// Codec
export {
  COLUMNS,
  FILENAME_PREFIX,
  FILENAME_SUFFIX,
  adler32,
  computeChecksum,
  encodeRow,
  filenameFor,
  verifyRow,
} from "./codec.js";
export { escapeCsvField, formatCsvRow } from "./csv.js";

// Console
export {
  CONSOLE_LEVELS,
  PinoConsoleSink,
  SYSTEM_LEVEL_VALUE,
  createRecordingSink,
} from "./console.js";
export type {
  ConsoleLevel,
  ConsoleSink,
  ConsoleThreshold,
  PinoConsoleSinkOptions,
  RecordedEntry,
} from "./console.js";

// Clock
export { fixedCalendar, fixedClock, localIsoDate, systemCalendar, systemClock } from "./clock.js";

// Config
export {
  ISO_DATE_PATTERN,
  IsoDateSchema,
  StoreConfigSchema,
  isIsoDate,
  parseStoreConfig,
  parseWithSchema,
} from "./config.js";
export type { IsoDate, StoreConfig } from "./config.js";

// Errors
export {
  DailyLogError,
  InvalidConfigError,
  InvalidDateError,
  InvalidTimestampError,
  classifyIoError,
  describeError,
} from "./errors.js";
export type { IoErrorKind } from "./errors.js";

// Types
export type {
  AppendState,
  Clock,
  DateProvider,
  EncodedRow,
  Identity,
  IdentitySource,
  RowFields,
  RowVerdict,
  ValidationOutcome,
} from "./types.js";
