// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { Clock, DateProvider } from "./types.js";

/**
 * Format a Date as its local calendar date, `YYYY-MM-DD`.
 */
export function localIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/** Wall-clock time in whole seconds. */
export const systemClock: Clock = {
  now(): number {
    return Math.floor(Date.now() / 1000);
  },
};

/** Today's date in the host's local time zone. */
export const systemCalendar: DateProvider = {
  today(): string {
    return localIsoDate(new Date());
  },
};

/**
 * A clock that always reports `seconds`.
 */
export function fixedClock(seconds: number): Clock {
  return { now: () => seconds };
}

/**
 * A date provider that always reports `date`.
 */
export function fixedCalendar(date: string): DateProvider {
  return { today: () => date };
}
