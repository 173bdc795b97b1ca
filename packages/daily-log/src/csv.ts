// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

const DELIMITER = ",";
const QUOTE = '"';

/**
 * Escape a value for CSV embedding:
 * - Wrap in double quotes if the value contains commas, line breaks, or quotes.
 * - Double any embedded double-quote characters.
 */
export function escapeCsvField(value: string): string {
  if (
    value.includes(DELIMITER) ||
    value.includes(QUOTE) ||
    value.includes("\n") ||
    value.includes("\r")
  ) {
    return `${QUOTE}${value.replace(/"/g, '""')}${QUOTE}`;
  }
  return value;
}

/**
 * Join fields into one CSV line. The caller appends the line terminator.
 */
export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(DELIMITER);
}
