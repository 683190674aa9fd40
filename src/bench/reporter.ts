/**
 * Text and JSON rendering of benchmark results.
 *
 * Line formats:
 *   10-element sequence [3, 7, 1, 5, 2, -6, 15, 4, 33, -5].
 *   Heapsort: 0.012ms [-6, -5, 1, 2, 3, 4, 5, 7, 15, 33] OK.
 *   Gnome sort: 1.250ms FAIL!!!
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { AlgorithmId } from '../registry/algorithm-registry.js';
import type { AlgorithmRun, BenchCase, CaseReport, SuiteReport } from './types.js';
import { runPassed } from './runner.js';

/** Sequences longer than this are left out of report lines. */
export const DEFAULT_PRINT_THRESHOLD = 20;

export interface ReportStyle {
  /** Colour instance; pass `new Chalk({ level: 0 })` for plain text. */
  chalk?: ChalkInstance;
  printThreshold?: number;
}

function resolveStyle(style: ReportStyle): { c: ChalkInstance; threshold: number } {
  return {
    c: style.chalk ?? chalk,
    threshold: style.printThreshold ?? DEFAULT_PRINT_THRESHOLD,
  };
}

export function formatSequence(seq: readonly number[]): string {
  return `[${seq.join(', ')}]`;
}

/**
 * " [a, b, c]" for short sequences, empty for long ones.
 */
function sequenceSuffix(seq: readonly number[], threshold: number, c: ChalkInstance): string {
  return seq.length <= threshold ? ` ${c.gray(formatSequence(seq))}` : '';
}

export function formatDuration(ms: number): string {
  return `${ms.toFixed(3)}ms`;
}

export function formatCaseHeader(benchCase: BenchCase, style: ReportStyle = {}): string {
  const { c, threshold } = resolveStyle(style);
  const input = benchCase.input;
  return c.bold(`${input.length}-element sequence`) + sequenceSuffix(input, threshold, c) + '.';
}

export function formatRun(run: AlgorithmRun, style: ReportStyle = {}): string {
  const { c, threshold } = resolveStyle(style);
  const head = `${run.algorithm.label}: ${c.bold(formatDuration(run.durationMs))}`;

  if (!runPassed(run)) {
    const reason = run.error !== undefined ? ` ${c.gray(`(${run.error})`)}` : '';
    return `${head} ${c.red('FAIL!!!')}${reason}`;
  }
  return `${head}${sequenceSuffix(run.output, threshold, c)} ${c.green('OK.')}`;
}

export function formatSkipped(skipped: readonly AlgorithmId[], style: ReportStyle = {}): string {
  const { c } = resolveStyle(style);
  return c.yellow(`Skipped (too slow): ${skipped.join(', ')}`);
}

/**
 * Header, a note on skipped algorithms if any, then one line per run.
 */
export function formatCase(report: CaseReport, style: ReportStyle = {}): string[] {
  const lines = [formatCaseHeader(report.benchCase, style)];
  if (report.skipped.length > 0) {
    lines.push(`  ${formatSkipped(report.skipped, style)}`);
  }
  for (const run of report.runs) {
    lines.push(`  ${formatRun(run, style)}`);
  }
  return lines;
}

export function formatSummary(report: SuiteReport, style: ReportStyle = {}): string {
  const { c } = resolveStyle(style);
  const totals = `${report.totalRuns} runs over ${report.cases.length} inputs in ${formatDuration(report.totalMs)} (seed ${report.seed})`;
  if (report.failures === 0) {
    return `${totals}: ${c.green('all OK.')}`;
  }
  return `${totals}: ${c.red(`${report.failures} failed.`)}`;
}

export function formatReport(report: SuiteReport, style: ReportStyle = {}): string[] {
  const lines: string[] = [];
  for (const caseReport of report.cases) {
    lines.push(...formatCase(caseReport, style), '');
  }
  lines.push(formatSummary(report, style));
  return lines;
}

export interface JsonRun {
  algorithm: string;
  label: string;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export interface JsonCase {
  name: string;
  length: number;
  runs: JsonRun[];
  skipped: string[];
}

export interface JsonReport {
  seed: number;
  totalRuns: number;
  failures: number;
  totalMs: number;
  cases: JsonCase[];
}

/**
 * Machine-readable form of a suite report (no sequences).
 */
export function toJsonReport(report: SuiteReport): JsonReport {
  return {
    seed: report.seed,
    totalRuns: report.totalRuns,
    failures: report.failures,
    totalMs: report.totalMs,
    cases: report.cases.map((caseReport) => ({
      name: caseReport.benchCase.name,
      length: caseReport.benchCase.input.length,
      runs: caseReport.runs.map((run) => {
        const entry: JsonRun = {
          algorithm: run.algorithm.id,
          label: run.algorithm.label,
          durationMs: run.durationMs,
          ok: runPassed(run),
        };
        if (run.error !== undefined) entry.error = run.error;
        return entry;
      }),
      skipped: [...caseReport.skipped],
    })),
  };
}
