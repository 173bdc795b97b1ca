// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { HELP_TEXT, parseCliArgs } from '../src/options.js';

describe('parseCliArgs', () => {
  it('uses defaults when no arguments are given', () => {
    expect(parseCliArgs([], {})).toEqual({
      kind: 'run',
      options: { directory: '.', logLevel: 'info' },
    });
  });

  it('reads every short option', () => {
    expect(parseCliArgs(['-d', '2020-07-04', '-o', 'logs', '-s', '42', '-l', 'DEBUG'], {})).toEqual({
      kind: 'run',
      options: { date: '2020-07-04', directory: 'logs', seed: 42, logLevel: 'debug' },
    });
  });

  it('reads long options, including negative seeds', () => {
    expect(parseCliArgs(['--date=2021-01-02', '--dir', 'out', '--seed=-7', '--log-level', 'warn'], {})).toEqual({
      kind: 'run',
      options: { date: '2021-01-02', directory: 'out', seed: -7, logLevel: 'warn' },
    });
  });

  it('falls back to LOG_LEVEL from the environment', () => {
    expect(parseCliArgs([], { LOG_LEVEL: 'error' })).toMatchObject({
      kind: 'run',
      options: { logLevel: 'error' },
    });
    expect(parseCliArgs(['-l', 'debug'], { LOG_LEVEL: 'error' })).toMatchObject({
      kind: 'run',
      options: { logLevel: 'debug' },
    });
  });

  it('returns the help text for -h and --help', () => {
    expect(parseCliArgs(['-h'], {})).toEqual({ kind: 'help', text: HELP_TEXT });
    expect(parseCliArgs(['-d', '2020-07-04', '--help'], {})).toEqual({ kind: 'help', text: HELP_TEXT });
  });

  it('rejects a malformed date', () => {
    expect(parseCliArgs(['-d', '2020-13-01'], {})).toEqual({
      kind: 'usage_error',
      message: 'date: must be an ISO 8601 date (YYYY-MM-DD)',
    });
  });

  it('rejects a non-integer seed', () => {
    expect(parseCliArgs(['-s', '4.5'], {})).toEqual({
      kind: 'usage_error',
      message: 'seed: must be an integer',
    });
  });

  it('rejects an unknown log level', () => {
    const result = parseCliArgs(['-l', 'loud'], {});
    expect(result.kind).toBe('usage_error');
    if (result.kind === 'usage_error') {
      expect(result.message).toMatch(/^logLevel: Invalid enum value/);
    }
  });

  it('rejects unknown options and positionals', () => {
    const unknown = parseCliArgs(['--verbose'], {});
    expect(unknown.kind).toBe('usage_error');
    if (unknown.kind === 'usage_error') {
      expect(unknown.message).toContain("'--verbose'");
    }
    expect(parseCliArgs(['extra'], {}).kind).toBe('usage_error');
  });

  it('rejects an option missing its value', () => {
    expect(parseCliArgs(['--date'], {}).kind).toBe('usage_error');
  });
});
