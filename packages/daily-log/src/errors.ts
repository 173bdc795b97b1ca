// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all @phase-deuce/daily-log errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages. Errors are only thrown
 * for caller mistakes; filesystem failures are reported as outcomes.
 */
export class DailyLogError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "DailyLogError";
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when store or CLI configuration is structurally invalid.
 *
 * `details` carries one entry per zod issue, formatted as `path: message`.
 */
export class InvalidConfigError extends DailyLogError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super("INVALID_CONFIG", `Configuration is invalid: ${details.join("; ")}`);
    this.name = "InvalidConfigError";
    this.details = details;
  }
}

/**
 * Thrown when a log date is not an ISO 8601 calendar date (`YYYY-MM-DD`).
 */
export class InvalidDateError extends DailyLogError {
  readonly value: string;

  constructor(value: string) {
    super("INVALID_DATE", `Date "${value}" is invalid (should be YYYY-MM-DD).`);
    this.name = "InvalidDateError";
    this.value = value;
  }
}

/**
 * Thrown when a row is encoded with a timestamp that is not a non-negative
 * integer.
 */
export class InvalidTimestampError extends DailyLogError {
  readonly value: number;

  constructor(value: number) {
    super("INVALID_TIMESTAMP", `Timestamp ${value} is not a non-negative integer.`);
    this.name = "InvalidTimestampError";
    this.value = value;
  }
}

export type IoErrorKind = "access_denied" | "not_found" | "general_failure";

/**
 * Map a filesystem error onto the coarse categories the store reports.
 */
export function classifyIoError(error: unknown): IoErrorKind {
  const code = errorCode(error);
  switch (code) {
    case "EACCES":
    case "EPERM":
      return "access_denied";
    case "ENOENT":
      return "not_found";
    default:
      return "general_failure";
  }
}

/**
 * Best-effort human-readable description of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}
