// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PassThrough, Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HELP_TEXT, USAGE_LINE, main, type MainIo } from '../src/index.js';

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function captureIo(keys = ''): MainIo & { out: () => string; err: () => string } {
  const stdout = capture();
  const stderr = capture();
  const stdin = new PassThrough();
  stdin.end(keys);
  return {
    stdin,
    stdout: stdout.stream,
    stderr: stderr.stream,
    consoleOptions: { level: 'silent' },
    out: stdout.text,
    err: stderr.text,
  };
}

describe('main', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'phase-deuce-main-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('prints help and exits with the usage code', async () => {
    const io = captureIo();
    expect(await main(['--help'], {}, io)).toBe(2);
    expect(io.out()).toBe(`${HELP_TEXT}\n`);
  });

  it('reports an invalid date as a usage error', async () => {
    const io = captureIo();
    expect(await main(['-d', '2020-02-40'], {}, io)).toBe(2);
    expect(io.err()).toBe(
      `${USAGE_LINE}\nphase-deuce: error: date: must be an ISO 8601 date (YYYY-MM-DD)\n`,
    );
  });

  it('appends seeded entries to the dated file', async () => {
    const io = captureIo('  q');
    expect(await main(['-o', directory, '-d', '2020-07-04', '-s', '7'], {}, io)).toBe(0);

    const text = await readFile(path.join(directory, 'phase-deuce-log_2020-07-04.csv'), 'utf8');
    const rows = text.split(/\r?\n/).filter((line) => line !== '');
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatch(/^\d+,Robert Williams,rwilliams@aol\.com,521-405-4662,\d+$/);
    expect(rows[1]).toMatch(/^\d+,Ethan Lewis,ethanlewis@outlook\.com,534-296-9779,\d+$/);
  });
});
