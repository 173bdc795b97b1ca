// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import {
  isWriteFailure,
  type ConsoleSink,
  type IdentitySource,
  type ValidationOutcome,
} from "@phase-deuce/daily-log";
import { EXIT_CODES, type ExitCode } from "./options.js";

export const SESSION_MESSAGES = {
  startup: "Application startup",
  shutdown: "Application shutdown",
  entryWritten: "Daily Log entry written",
  welcome: "Welcome to phase-deuce",
  about: "Synthetic identities, one CSV row per keypress, checksummed with Adler-32",
  keyHelp: "Press SPACE to add a new log entry. Press Q or X or CTRL-C to exit.",
} as const;

export const KEY_APPEND = " ";
export const KEY_CTRL_C = "\u0003";

/** The part of DailyLogStore a session drives. */
export interface EntryWriter {
  append(identities: IdentitySource): Promise<ValidationOutcome>;
  pathFor(): string;
}

/** A console sink that can also report a step as OK or FAIL. */
export interface StatusConsole extends ConsoleSink {
  status(ok: boolean, message: string): void;
}

export interface SessionOptions {
  readonly store: EntryWriter;
  readonly identities: IdentitySource;
  readonly console: StatusConsole;
  /** Reported in the startup debug line. Defaults to `process.platform`. */
  readonly platform?: NodeJS.Platform;
}

export function isQuitKey(key: string): boolean {
  const upper = key.toUpperCase();
  return upper === "Q" || upper === "X" || key === KEY_CTRL_C;
}

export function describePlatform(platform: NodeJS.Platform): string {
  return platform === "win32"
    ? "Detected operating system: Windows"
    : "Detected operating system: Linux/macOS";
}

/**
 * One interactive run: a banner, then one appended entry per SPACE until a
 * quit key arrives or the key stream ends.
 *
 * The session reports through its console and returns an exit code; it never
 * ends the process itself.
 */
export class Session {
  private readonly store: EntryWriter;
  private readonly identities: IdentitySource;
  private readonly console: StatusConsole;
  private readonly platform: NodeJS.Platform;

  constructor(options: SessionOptions) {
    this.store = options.store;
    this.identities = options.identities;
    this.console = options.console;
    this.platform = options.platform ?? process.platform;
  }

  async run(keys: AsyncIterable<string>): Promise<ExitCode> {
    this.console.status(true, SESSION_MESSAGES.startup);
    this.console.emit("debug", describePlatform(this.platform));
    this.banner();

    try {
      for await (const key of keys) {
        if (key === KEY_APPEND) {
          await this.appendEntry();
        } else if (isQuitKey(key)) {
          break;
        }
      }
    } finally {
      this.console.status(true, SESSION_MESSAGES.shutdown);
    }
    return EXIT_CODES.success;
  }

  private banner(): void {
    this.console.emit("info", SESSION_MESSAGES.welcome);
    this.console.emit("info", SESSION_MESSAGES.about);
    this.console.emit("info", `Writing entries to ${this.store.pathFor()}`);
    this.console.emit("info", SESSION_MESSAGES.keyHelp);
  }

  // Checksum and corruption findings are warnings; only a failed write or an
  // unreadable file counts against the entry.
  private async appendEntry(): Promise<void> {
    const outcome = await this.store.append(this.identities);
    this.console.status(!isWriteFailure(outcome), SESSION_MESSAGES.entryWritten);
  }
}
