/**
 * Types for the sort benchmark harness.
 */

import type { AlgorithmId, SortAlgorithm } from '../registry/algorithm-registry.js';

/** One named input that every selected algorithm sorts a copy of. */
export interface BenchCase {
  name: string;
  input: readonly number[];
}

/** Result of one algorithm on one case. */
export interface AlgorithmRun {
  algorithm: SortAlgorithm;
  /** Wall-clock time of the sort call alone. */
  durationMs: number;
  /** Output passed the sortedness check. */
  sorted: boolean;
  /** Output kept the input's elements. */
  permutation: boolean;
  output: number[];
  /** Message of the error the algorithm threw, if any. */
  error?: string;
}

export interface CaseReport {
  benchCase: BenchCase;
  runs: AlgorithmRun[];
  /** Algorithms left out because the input was too long for them. */
  skipped: AlgorithmId[];
}

export interface SuiteReport {
  seed: number;
  cases: CaseReport[];
  totalRuns: number;
  failures: number;
  totalMs: number;
}

/** Selects which algorithms run on an input of a given length. */
export interface SelectionOptions {
  /** Leave quadratic algorithms out of inputs longer than slowLimit. */
  skipSlowest?: boolean;
  slowLimit?: number;
  /** Only these algorithms (default: all). */
  only?: readonly AlgorithmId[];
  /** Pool to select from (default: the registry). */
  algorithms?: readonly SortAlgorithm[];
}

export interface RunOptions {
  /** Clock in milliseconds (default: performance.now). */
  now?: () => number;
}

export interface SuiteOptions extends SelectionOptions, RunOptions {
  seed?: number;
  /** Called before a case runs, with the algorithms left out of it. */
  onCase?: (benchCase: BenchCase, skipped: readonly AlgorithmId[]) => void;
  onRun?: (run: AlgorithmRun, benchCase: BenchCase) => void;
}

export interface CaseOptions {
  sizes: readonly number[];
  seed: number;
  includeLiterals?: boolean;
}
