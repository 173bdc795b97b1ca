// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from "zod";
import { InvalidConfigError } from "./errors.js";

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

/**
 * `YYYY-MM-DD` with month 01-12 and day 01-31. Day-of-month is not checked
 * against the month length.
 */
export const ISO_DATE_PATTERN = /^\d{4}-(0[1-9]|1[012])-(0[1-9]|[12][0-9]|3[01])$/;

/**
 * Zod schema for a log date.
 */
export const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, "must be an ISO 8601 date (YYYY-MM-DD)");

export type IsoDate = z.infer<typeof IsoDateSchema>;

// ---------------------------------------------------------------------------
// Store config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the serialisable part of DailyLogStore options.
 */
export const StoreConfigSchema = z.object({
  /** Directory holding the daily files. Defaults to the working directory. */
  directory: z.string().min(1).default("."),
  /**
   * Fixed log date. When omitted, each call uses the date provider's current
   * date at call time.
   */
  date: IsoDateSchema.optional(),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helper
// ---------------------------------------------------------------------------

/**
 * Parse `raw` against `schema`, throwing InvalidConfigError with one detail
 * per issue on failure.
 */
export function parseWithSchema<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

/**
 * Parse and validate a StoreConfig, throwing InvalidConfigError on failure.
 */
export function parseStoreConfig(raw: unknown): StoreConfig {
  return parseWithSchema(StoreConfigSchema, raw);
}

export function isIsoDate(value: string): value is IsoDate {
  return ISO_DATE_PATTERN.test(value);
}
