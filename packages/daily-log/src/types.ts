// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * One synthetic identity as produced by an {@link IdentitySource}.
 * The store trusts these values as given and never re-formats them.
 */
export interface Identity {
  readonly fullName: string;
  readonly email: string;
  /** NANP formatted `NPA-NXX-XXXX`. */
  readonly phone: string;
}

/**
 * Supplies one identity per call. The store consumes exactly one identity per
 * append and never retries.
 */
export interface IdentitySource {
  next(): Identity;
}

/**
 * The five text columns of a row, in on-disk order.
 */
export type RowFields = readonly [
  timestamp: string,
  fullName: string,
  email: string,
  phone: string,
  checksum: string,
];

/**
 * Output of the codec's encoder: the display-formatted columns plus the
 * numeric checksum they end with.
 */
export interface EncodedRow {
  readonly fields: RowFields;
  readonly checksum: number;
}

/**
 * Result of checking a single row in isolation.
 */
export type RowVerdict =
  | { readonly status: "ok" }
  | { readonly status: "corrupt_row"; readonly reason: string }
  | {
      readonly status: "checksum_mismatch";
      readonly stored: number;
      readonly computed: number;
    };

/**
 * Result of a validation pass over one daily log file.
 *
 * `checksum_mismatch` and `corrupt_row` describe data already on disk;
 * `access_denied` and `general_failure` mean the pass itself could not run.
 */
export type ValidationOutcome =
  | { readonly status: "ok"; readonly path: string; readonly rowCount: number }
  | {
      readonly status: "checksum_mismatch";
      readonly path: string;
      readonly rowIndex: number;
      readonly stored: number;
      readonly computed: number;
    }
  | {
      readonly status: "corrupt_row";
      readonly path: string;
      readonly rowIndex: number;
      readonly reason: string;
    }
  | { readonly status: "access_denied"; readonly path: string; readonly message: string }
  | { readonly status: "general_failure"; readonly path: string; readonly message: string };

/**
 * Terminal state of one append call.
 *
 * - `ok`     — row written and the whole file verified.
 * - `warned` — row written, but older data in the file failed verification.
 * - `failed` — the write or the validation read could not be performed.
 */
export type AppendState = "ok" | "warned" | "failed";

/**
 * Source of the current time.
 */
export interface Clock {
  /** Whole seconds since the Unix epoch. */
  now(): number;
}

/**
 * Source of the current calendar date.
 */
export interface DateProvider {
  /** Local calendar date as `YYYY-MM-DD`. */
  today(): string;
}
