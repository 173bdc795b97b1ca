// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { on } from "node:events";
import { emitKeypressEvents } from "node:readline";
import type { Readable } from "node:stream";

/** A readable that may be a terminal, like `process.stdin`. */
export type KeyInput = Readable & {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Yield each keypress on `input` as the text it produced (`" "`, `"q"`,
 * `"\u0003"` for Ctrl-C). A terminal is put in raw mode for the duration and
 * restored when iteration stops or the input ends.
 */
export async function* terminalKeys(input: KeyInput = process.stdin): AsyncGenerator<string> {
  emitKeypressEvents(input);
  const raw = input.isTTY === true && input.setRawMode !== undefined;
  const wasRaw = input.isRaw === true;
  if (raw) {
    input.setRawMode?.(true);
  }

  const ended = new AbortController();
  const onEnd = (): void => ended.abort();
  input.once("end", onEnd);
  const events = on(input, "keypress", { signal: ended.signal });
  input.resume();

  try {
    for await (const event of events) {
      const text = keyText(event);
      if (text !== undefined) {
        yield text;
      }
    }
  } catch (error) {
    if (!ended.signal.aborted) {
      throw error;
    }
  } finally {
    input.off("end", onEnd);
    if (raw) {
      input.setRawMode?.(wasRaw);
    }
    input.pause();
  }
}

// `keypress` listeners receive `(text, key)`; text is undefined for escape
// sequences such as arrow keys.
function keyText(args: unknown): string | undefined {
  if (!Array.isArray(args)) {
    return undefined;
  }
  const [text]: unknown[] = args;
  return typeof text === "string" ? text : undefined;
}
