// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import ADLER32 from "adler-32";
import { isIsoDate } from "./config.js";
import { InvalidDateError, InvalidTimestampError } from "./errors.js";
import type { EncodedRow, Identity, RowVerdict } from "./types.js";

/** Every daily file name starts with this prefix. */
export const FILENAME_PREFIX = "phase-deuce-log_";

/** Every daily file name ends with this suffix. */
export const FILENAME_SUFFIX = ".csv";

/** Column names, in on-disk order. Files carry no header row. */
export const COLUMNS = [
  "unix_time",
  "full_name",
  "email_address",
  "phone_number",
  "checksum",
] as const;

const FIELD_COUNT = COLUMNS.length;
const CHECKSUM_PATTERN = /^\d+$/;

/**
 * File name for the log of a given calendar date.
 *
 * @example
 * filenameFor("2020-07-04") // "phase-deuce-log_2020-07-04.csv"
 */
export function filenameFor(date: string): string {
  if (!isIsoDate(date)) {
    throw new InvalidDateError(date);
  }
  return `${FILENAME_PREFIX}${date}${FILENAME_SUFFIX}`;
}

/**
 * Adler-32 over the UTF-8 bytes of `text`, as an unsigned 32-bit integer.
 */
export function adler32(text: string): number {
  return ADLER32.buf(Buffer.from(text, "utf8")) >>> 0;
}

/**
 * Checksum of a row's data columns: the four values are concatenated in
 * column order with no separator.
 */
export function computeChecksum(
  timestamp: string,
  fullName: string,
  email: string,
  phone: string,
): number {
  return adler32(timestamp + fullName + email + phone);
}

/**
 * Build the on-disk columns for one identity at `timestamp`.
 */
export function encodeRow(timestamp: number, identity: Identity): EncodedRow {
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new InvalidTimestampError(timestamp);
  }
  const unixTime = String(timestamp);
  const checksum = computeChecksum(unixTime, identity.fullName, identity.email, identity.phone);
  return {
    fields: [unixTime, identity.fullName, identity.email, identity.phone, String(checksum)],
    checksum,
  };
}

/**
 * Re-derive a row's checksum from its stored text and compare it with the
 * stored value. Columns past the fifth are ignored.
 */
export function verifyRow(fields: readonly string[]): RowVerdict {
  const [unixTime, fullName, email, phone, storedText] = fields;
  if (
    fields.length < FIELD_COUNT ||
    unixTime === undefined ||
    fullName === undefined ||
    email === undefined ||
    phone === undefined ||
    storedText === undefined
  ) {
    return {
      status: "corrupt_row",
      reason: `expected ${FIELD_COUNT} fields but found ${fields.length}`,
    };
  }

  if (!CHECKSUM_PATTERN.test(storedText)) {
    return {
      status: "corrupt_row",
      reason: `checksum field "${storedText}" is not an unsigned integer`,
    };
  }

  const stored = Number(storedText);
  const computed = computeChecksum(unixTime, fullName, email, phone);
  if (stored !== computed) {
    return { status: "checksum_mismatch", stored, computed };
  }
  return { status: "ok" };
}

