/**
 * Benchmark inputs: the fixed literal sequences and seeded random ones.
 */

import { BenchmarkError } from '../utils/errors.js';
import type { BenchCase, CaseOptions } from './types.js';

/** Pseudo-random source yielding integers in [0, 2^31). */
export type Rng = () => number;

const RNG_RANGE = 0x80000000;

/** Default bounds for random values. */
export const DEFAULT_MIN = -1_000_000_000;
export const DEFAULT_MAX = 1_000_000_000;

/**
 * Small hand-picked inputs: duplicates, negatives, two-element orders
 * and the empty sequence.
 */
export const LITERAL_INPUTS: readonly (readonly number[])[] = [
  [111, 333, 222],
  [3, 7, 1, 5, 2, -6, 15, 4, 33, -5],
  [9, 9, 1, 8, 3, 0, 2, 0, 7, 15, 4, 3, 3],
  [2, 1],
  [1, 2],
  [5],
  [],
];

/**
 * Deterministic LCG (Numerical Recipes constants), truncated to 31 bits.
 */
export function createRng(seed: number): Rng {
  let s = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  return () => {
    s = (s * 1664525 + 1013904223) & 0x7fffffff;
    return s;
  };
}

/**
 * `length` random integers in [min, max].
 */
export function randomIntegers(
  length: number,
  rng: Rng,
  min: number = DEFAULT_MIN,
  max: number = DEFAULT_MAX,
): number[] {
  if (!Number.isInteger(length) || length < 0) {
    throw new BenchmarkError(`Input length must be a non-negative integer, got ${length}`, 'INVALID_INPUT');
  }
  if (max < min) {
    throw new BenchmarkError(`Empty value range [${min}, ${max}]`, 'INVALID_INPUT');
  }

  const span = max - min + 1;
  const values: number[] = new Array(length);
  for (let i = 0; i < length; i++) {
    values[i] = min + Math.floor((rng() / RNG_RANGE) * span);
  }
  return values;
}

/**
 * A shuffled 0..n-1 (Fisher-Yates).
 */
export function randomPermutation(n: number, rng: Rng): number[] {
  const values = Array.from({ length: n }, (_, i) => i);
  for (let i = values.length - 1; i > 0; i--) {
    const j = Math.floor((rng() / RNG_RANGE) * (i + 1));
    [values[i], values[j]] = [values[j], values[i]];
  }
  return values;
}

/**
 * The cases of a run: literal inputs first (if enabled), then one random
 * input per size. Each size gets its own generator derived from the seed,
 * so adding a size does not change the others.
 */
export function buildCases(options: CaseOptions): BenchCase[] {
  const cases: BenchCase[] = [];

  if (options.includeLiterals ?? true) {
    LITERAL_INPUTS.forEach((input, i) => {
      cases.push({ name: `literal-${i + 1}`, input });
    });
  }

  options.sizes.forEach((size, i) => {
    const rng = createRng(options.seed + i * 100);
    cases.push({ name: `random-${size}`, input: randomIntegers(size, rng) });
  });

  return cases;
}
