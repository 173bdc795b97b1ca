// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { readFileSync } from "node:fs";
import { parseWithSchema } from "@phase-deuce/daily-log";
import { z } from "zod";

const NameListSchema = z.array(z.string().min(1)).nonempty();

/**
 * Zod schema for the word lists a PersonGenerator draws from.
 */
export const NameListsSchema = z.object({
  firstNames: NameListSchema,
  lastNames: NameListSchema,
  emailDomains: z.array(z.string().regex(/^[a-z0-9.-]+\.[a-z]{2,}$/i)).nonempty(),
});

export type NameLists = z.infer<typeof NameListsSchema>;

const DEFAULT_NAMES_URL = new URL("../data/names.json", import.meta.url);

let defaultNames: NameLists | undefined;

/**
 * Parse name lists from JSON text, throwing InvalidConfigError on failure.
 */
export function parseNameLists(json: string): NameLists {
  return parseWithSchema(NameListsSchema, JSON.parse(json));
}

/**
 * The bundled name lists. Read from disk on first use and cached.
 */
export function loadNameLists(): NameLists {
  defaultNames ??= parseNameLists(readFileSync(DEFAULT_NAMES_URL, "utf8"));
  return defaultNames;
}
