/**
 * Benchmark runner.
 *
 * Sorts an independent copy of each input with each selected algorithm,
 * times the call and checks the result. A failing or throwing algorithm
 * is recorded and the suite moves on.
 */

import { defaultLess, isSorted } from '../core/ordering.js';
import { getAllAlgorithms, type AlgorithmId, type SortAlgorithm } from '../registry/algorithm-registry.js';
import { createLogger } from '../utils/logger.js';
import type {
  AlgorithmRun,
  BenchCase,
  CaseReport,
  RunOptions,
  SelectionOptions,
  SuiteOptions,
  SuiteReport,
} from './types.js';

const log = createLogger('bench-runner');

const defaultNow = (): number => performance.now();

/**
 * True when `output` holds exactly the elements of `input`.
 */
export function isPermutationOf(input: readonly number[], output: readonly number[]): boolean {
  if (input.length !== output.length) return false;

  const counts = new Map<number, number>();
  for (const value of input) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  for (const value of output) {
    const count = counts.get(value);
    if (!count) return false;
    counts.set(value, count - 1);
  }
  return true;
}

/**
 * Run one algorithm on a copy of `input`.
 */
export function runAlgorithm(
  algorithm: SortAlgorithm,
  input: readonly number[],
  options: RunOptions = {},
): AlgorithmRun {
  const now = options.now ?? defaultNow;
  const output = [...input];

  const start = now();
  try {
    algorithm.sort(output, defaultLess);
  } catch (error) {
    const durationMs = now() - start;
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`${algorithm.id} threw`, { length: input.length, error: message });
    return { algorithm, durationMs, sorted: false, permutation: false, output, error: message };
  }
  const durationMs = now() - start;

  const sorted = isSorted(output);
  const permutation = isPermutationOf(input, output);
  if (!sorted || !permutation) {
    log.warn(`${algorithm.id} produced a wrong result`, { length: input.length, sorted, permutation });
  }

  return { algorithm, durationMs, sorted, permutation, output };
}

/**
 * A run counts as passed when the output is a sorted permutation.
 */
export function runPassed(run: AlgorithmRun): boolean {
  return run.error === undefined && run.sorted && run.permutation;
}

/**
 * Algorithms to run on an input of `length` elements, in registry order,
 * plus the ids left out for being quadratic on a large input.
 */
export function selectAlgorithms(
  length: number,
  options: SelectionOptions = {},
): { selected: SortAlgorithm[]; skipped: AlgorithmId[] } {
  const only = options.only && options.only.length > 0 ? new Set(options.only) : undefined;
  const tooLong = options.skipSlowest === true && length > (options.slowLimit ?? 0);

  const selected: SortAlgorithm[] = [];
  const skipped: AlgorithmId[] = [];

  for (const algorithm of options.algorithms ?? getAllAlgorithms()) {
    if (only && !only.has(algorithm.id)) continue;
    if (tooLong && algorithm.quadratic) {
      skipped.push(algorithm.id);
      continue;
    }
    selected.push(algorithm);
  }

  return { selected, skipped };
}

/**
 * Run every selected algorithm on every case, one after another.
 */
export function runSuite(cases: readonly BenchCase[], options: SuiteOptions = {}): SuiteReport {
  const reports: CaseReport[] = [];
  let totalRuns = 0;
  let failures = 0;
  let totalMs = 0;

  for (const benchCase of cases) {
    const { selected, skipped } = selectAlgorithms(benchCase.input.length, options);
    options.onCase?.(benchCase, skipped);
    log.debug(`Running ${benchCase.name}`, {
      length: benchCase.input.length,
      algorithms: selected.length,
      skipped: skipped.length,
    });

    const runs: AlgorithmRun[] = [];
    for (const algorithm of selected) {
      const run = runAlgorithm(algorithm, benchCase.input, options);
      runs.push(run);
      options.onRun?.(run, benchCase);

      totalRuns++;
      totalMs += run.durationMs;
      if (!runPassed(run)) failures++;
    }

    reports.push({ benchCase, runs, skipped });
  }

  return { seed: options.seed ?? 0, cases: reports, totalRuns, failures, totalMs };
}
