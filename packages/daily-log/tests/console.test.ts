// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { PinoConsoleSink, createRecordingSink } from '../src/console.js';

function captureLines(): { lines: string[]; write(chunk: string): void } {
  const lines: string[] = [];
  return {
    lines,
    write(chunk: string): void {
      lines.push(chunk);
    },
  };
}

function parsed(lines: string[]): Array<Record<string, unknown>> {
  return lines.map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe('PinoConsoleSink', () => {
  it('writes entries at or above the threshold', () => {
    const destination = captureLines();
    const sink = new PinoConsoleSink({ level: 'info', destination });

    sink.emit('debug', 'hidden');
    sink.emit('info', 'Welcome');
    sink.emit('warn', 'careful');
    sink.emit('error', 'broken');

    expect(parsed(destination.lines).map((entry) => [entry['level'], entry['msg']])).toEqual([
      [30, 'Welcome'],
      [40, 'careful'],
      [50, 'broken'],
    ]);
  });

  it('writes debug entries when the threshold is debug', () => {
    const destination = captureLines();
    const sink = new PinoConsoleSink({ level: 'debug', destination });
    sink.emit('debug', 'details');
    expect(parsed(destination.lines)[0]).toMatchObject({ level: 20, msg: 'details' });
  });

  it('logs system entries above error', () => {
    const destination = captureLines();
    const sink = new PinoConsoleSink({ level: 'system', destination });

    sink.emit('error', 'hidden');
    sink.emit('system', 'Application startup');

    expect(destination.lines).toHaveLength(1);
    expect(parsed(destination.lines)[0]).toMatchObject({ level: 55, msg: 'Application startup' });
  });

  it('tags status entries with OK or FAIL', () => {
    const destination = captureLines();
    const sink = new PinoConsoleSink({ destination });

    sink.status(true, 'Daily Log entry written');
    sink.status(false, 'Daily Log entry written');

    expect(parsed(destination.lines)).toMatchObject([
      { level: 55, status: 'OK', msg: 'Daily Log entry written' },
      { level: 55, status: 'FAIL', msg: 'Daily Log entry written' },
    ]);
  });

  it('writes nothing when silent', () => {
    const destination = captureLines();
    const sink = new PinoConsoleSink({ level: 'silent', destination });
    sink.emit('system', 'quiet');
    sink.status(false, 'quiet');
    expect(destination.lines).toEqual([]);
  });

  it('attaches the logger name when given', () => {
    const destination = captureLines();
    const sink = new PinoConsoleSink({ name: 'phase-deuce', destination });
    sink.emit('info', 'hello');
    const [entry] = parsed(destination.lines);
    expect(entry).toMatchObject({ name: 'phase-deuce', msg: 'hello' });
    expect(entry).not.toHaveProperty('pid');
  });
});

describe('createRecordingSink', () => {
  it('keeps entries in emission order', () => {
    const sink = createRecordingSink();
    sink.emit('warn', 'first');
    sink.emit('error', 'second');
    expect(sink.entries).toEqual([
      { level: 'warn', message: 'first' },
      { level: 'error', message: 'second' },
    ]);
  });
});
