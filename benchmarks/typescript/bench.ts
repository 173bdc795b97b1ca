// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * phase-deuce benchmark — codec and store throughput.
 *
 * Runs the row codec, validation of a 1000-row file and a real
 * append-then-validate cycle against a temporary directory, and writes a
 * JSON results object to stdout.
 * No external benchmark framework — uses node:perf_hooks only.
 *
 * Usage:
 *   npx tsx benchmarks/typescript/bench.ts > results/typescript.json
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import {
  DailyLogStore,
  adler32,
  createRecordingSink,
  encodeRow,
  fixedCalendar,
  formatCsvRow,
  verifyRow,
  type Identity,
} from '@phase-deuce/daily-log';
import { PersonGenerator } from '@phase-deuce/identity';

// ─── Types ───────────────────────────────────────────────────────────────────

interface ScenarioResult {
  readonly name: string;
  readonly iterations: number;
  readonly ops_per_sec: number;
  readonly mean_ns: number;
  readonly stdev_ns: number;
}

interface BenchmarkReport {
  readonly language: 'typescript';
  readonly runtime: string;
  readonly timestamp: string;
  readonly scenarios: readonly ScenarioResult[];
}

type BenchmarkFn = () => void | Promise<void>;

// ─── Timing helpers ───────────────────────────────────────────────────────────

/** Run `fn` for `iterations` cycles and return statistics in nanoseconds. */
async function measureIterations(
  fn: BenchmarkFn,
  iterations: number,
): Promise<{ meanNs: number; stdevNs: number }> {
  const samples: number[] = [];

  // Warm-up — not included in results
  for (let warmup = 0; warmup < Math.min(1000, iterations / 10); warmup++) {
    await fn();
  }

  for (let index = 0; index < iterations; index++) {
    const start = performance.now();
    await fn();
    const end = performance.now();
    samples.push((end - start) * 1_000_000); // ms -> ns
  }

  const mean = samples.reduce((sum, value) => sum + value, 0) / samples.length;
  const variance =
    samples.reduce((sum, value) => sum + (value - mean) ** 2, 0) / samples.length;
  const stdev = Math.sqrt(variance);

  return { meanNs: Math.round(mean), stdevNs: Math.round(stdev) };
}

async function toScenarioResult(
  name: string,
  iterations: number,
  fn: BenchmarkFn,
): Promise<ScenarioResult> {
  const { meanNs, stdevNs } = await measureIterations(fn, iterations);
  const opsPerSec = meanNs > 0 ? Math.round(1_000_000_000 / meanNs) : 0;
  return { name, iterations, ops_per_sec: opsPerSec, mean_ns: meanNs, stdev_ns: stdevNs };
}

// ─── Scenarios ────────────────────────────────────────────────────────────────

const identity: Identity = {
  fullName: 'Jane Doe',
  email: 'jane.doe@gmail.com',
  phone: '425-555-0199',
};

function benchChecksum(): Promise<ScenarioResult> {
  const text = '1700000000Jane Doejane.doe@gmail.com425-555-0199';
  return toScenarioResult('adler32', 100_000, () => {
    adler32(text);
  });
}

function benchEncodeVerify(): Promise<ScenarioResult> {
  return toScenarioResult('encode_verify_row', 50_000, () => {
    const { fields } = encodeRow(1700000000, identity);
    if (verifyRow(fields).status !== 'ok') {
      throw new Error('Round trip failed');
    }
  });
}

async function benchValidateFile(directory: string): Promise<ScenarioResult> {
  const generator = new PersonGenerator({ seed: 1 });
  const lines: string[] = [];
  for (let index = 0; index < 1000; index++) {
    lines.push(formatCsvRow(encodeRow(1700000000 + index, generator.next()).fields));
  }
  const store = new DailyLogStore({
    directory,
    date: '2020-01-01',
    console: createRecordingSink(),
  });
  await writeFile(store.pathFor(), lines.join('\n') + '\n', 'utf8');

  return toScenarioResult('validate_1000_rows', 200, async () => {
    const outcome = await store.validate();
    if (outcome.status !== 'ok') {
      throw new Error(`Unexpected outcome: ${outcome.status}`);
    }
  });
}

// Each append re-reads the whole file, so the cost grows with the row count.
async function benchAppend(directory: string): Promise<ScenarioResult> {
  const store = new DailyLogStore({
    directory,
    console: createRecordingSink(),
    calendar: fixedCalendar('2023-11-14'),
  });
  const generator = new PersonGenerator({ seed: 2 });

  return toScenarioResult('append_validate', 500, async () => {
    const outcome = await store.append(generator);
    if (outcome.status !== 'ok') {
      throw new Error(`Append failed: ${outcome.status}`);
    }
  });
}

// ─── Entry point ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const directory = await mkdtemp(path.join(tmpdir(), 'phase-deuce-bench-'));
  try {
    const scenarios: ScenarioResult[] = [
      await benchChecksum(),
      await benchEncodeVerify(),
      await benchValidateFile(directory),
      await benchAppend(directory),
    ];

    const report: BenchmarkReport = {
      language: 'typescript',
      runtime: `node-${process.version}`,
      timestamp: new Date().toISOString(),
      scenarios,
    };

    process.stdout.write(JSON.stringify(report, null, 2) + '\n');
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

await main();
