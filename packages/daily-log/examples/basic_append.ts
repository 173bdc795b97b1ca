// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic_append.ts — Demonstrates core DailyLogStore usage.
 *
 * Shows how to:
 * - Create a store for a fixed date in a scratch directory
 * - Append entries from a seeded identity source
 * - Tamper with a row and see validation report it
 *
 * Run: npx tsx packages/daily-log/examples/basic_append.ts
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PersonGenerator } from "@phase-deuce/identity";
import { DailyLogStore, PinoConsoleSink, settleAppend } from "../src/index.js";

async function main(): Promise<void> {
  const directory = await mkdtemp(path.join(tmpdir(), "daily-log-example-"));
  const console = new PinoConsoleSink({ level: "debug", name: "basic_append" });
  const store = new DailyLogStore({ directory, date: "2020-07-04", console });
  const people = new PersonGenerator({ seed: 7 });

  try {
    for (let index = 0; index < 3; index++) {
      const outcome = await store.append(people);
      console.status(settleAppend(outcome) !== "failed", `Appended entry ${index + 1}`);
    }

    const file = store.pathFor();
    process.stdout.write(`\n${await readFile(file, "utf8")}\n`);

    // Swap one letter in the second row's name; its checksum no longer holds.
    const text = await readFile(file, "utf8");
    await writeFile(file, text.replace("Ethan Lewis", "Ethan Lewiz"), "utf8");

    const outcome = await store.validate();
    console.emit("info", `Validation after tampering: ${outcome.status}`);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`${String(error)}\n`);
  process.exitCode = 1;
});
