// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { Identity, IdentitySource } from "@phase-deuce/daily-log";
import { loadNameLists, type NameLists } from "./names.js";
import { pick, randomInt, randomSeed, seededRandom, type RandomSource } from "./random.js";

/**
 * 10-digit NANP number, `NPA-NXX-XXXX`: area code starts 2-9 with a middle
 * digit 0-8, exchange code starts 2-9.
 */
export const NANP_PHONE_PATTERN = /^\(?([2-9][0-8][0-9])\)?[-.]?([2-9][0-9]{2})[-.]?([0-9]{4})$/;

export function isNanpPhoneNumber(value: string): boolean {
  return NANP_PHONE_PATTERN.test(value);
}

/** Username layouts, applied to lowercased names. */
export const EMAIL_STYLES = ["first.last", "last.first", "firstlast", "flast"] as const;

export type EmailStyle = (typeof EMAIL_STYLES)[number];

export interface PersonGeneratorOptions {
  /** Seed for the built-in Mulberry32 generator. */
  readonly seed?: number;
  /** Custom random source. Takes precedence over `seed`. */
  readonly random?: RandomSource;
  /** Word lists. Defaults to the bundled `data/names.json`. */
  readonly names?: NameLists;
}

/**
 * Generates pseudo-random people: a first and last name, an email address
 * built from them, and a NANP phone number.
 *
 * All randomness comes from the configured source, so two generators built
 * with the same seed produce the same identities in the same order.
 */
export class PersonGenerator implements IdentitySource {
  private readonly random: RandomSource;
  private readonly names: NameLists;

  constructor(options: PersonGeneratorOptions = {}) {
    this.random = options.random ?? seededRandom(options.seed ?? randomSeed());
    this.names = options.names ?? loadNameLists();
  }

  next(): Identity {
    const firstName = pick(this.random, this.names.firstNames);
    const lastName = pick(this.random, this.names.lastNames);
    return {
      fullName: `${firstName} ${lastName}`,
      email: this.email(firstName, lastName),
      phone: this.phoneNumber(),
    };
  }

  private email(firstName: string, lastName: string): string {
    const style = pick(this.random, EMAIL_STYLES);
    const domain = pick(this.random, this.names.emailDomains);
    return `${formatUsername(style, firstName, lastName)}@${domain}`;
  }

  // Redraws until valid; a little over 2 in 5 draws are rejected.
  private phoneNumber(): string {
    for (;;) {
      const npa = String(randomInt(this.random, 0, 1000)).padStart(3, "0");
      const nxx = String(randomInt(this.random, 0, 1000)).padStart(3, "0");
      const xxxx = String(randomInt(this.random, 0, 10000)).padStart(4, "0");
      const candidate = `${npa}-${nxx}-${xxxx}`;
      if (isNanpPhoneNumber(candidate)) {
        return candidate;
      }
    }
  }
}

export function formatUsername(style: EmailStyle, firstName: string, lastName: string): string {
  const first = firstName.toLowerCase();
  const last = lastName.toLowerCase();
  switch (style) {
    case "first.last":
      return `${first}.${last}`;
    case "last.first":
      return `${last}.${first}`;
    case "firstlast":
      return `${first}${last}`;
    case "flast":
      return `${first.slice(0, 1)}${last}`;
  }
}
