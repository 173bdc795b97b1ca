// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * A uniform random source returning values in `[0, 1)`.
 */
export type RandomSource = () => number;

/**
 * Seeded Mulberry32 generator. The same seed always yields the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Integer in `[min, maxExclusive)`.
 */
export function randomInt(random: RandomSource, min: number, maxExclusive: number): number {
  return min + Math.floor(random() * (maxExclusive - min));
}

/**
 * Uniformly chosen element of a non-empty list.
 */
export function pick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  return items[randomInt(random, 0, items.length)] ?? items[0];
}

/**
 * A fresh 32-bit seed for callers that do not supply one.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) | 0;
}
