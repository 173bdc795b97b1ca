// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @phase-deuce/identity — Seeded synthetic identities (name, email, NANP
 * phone) for the daily log.
 */

export {
  EMAIL_STYLES,
  NANP_PHONE_PATTERN,
  PersonGenerator,
  formatUsername,
  isNanpPhoneNumber,
} from "./generator.js";
export type { EmailStyle, PersonGeneratorOptions } from "./generator.js";

export { NameListsSchema, loadNameLists, parseNameLists } from "./names.js";
export type { NameLists } from "./names.js";

export { pick, randomInt, randomSeed, seededRandom } from "./random.js";
export type { RandomSource } from "./random.js";
