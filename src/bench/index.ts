export * from './types.js';
export {
  createRng,
  randomIntegers,
  randomPermutation,
  buildCases,
  LITERAL_INPUTS,
  DEFAULT_MIN,
  DEFAULT_MAX,
} from './input-generator.js';
export type { Rng } from './input-generator.js';
export { isPermutationOf, runAlgorithm, runPassed, selectAlgorithms, runSuite } from './runner.js';
export {
  DEFAULT_PRINT_THRESHOLD,
  formatSequence,
  formatDuration,
  formatCaseHeader,
  formatRun,
  formatSkipped,
  formatCase,
  formatSummary,
  formatReport,
  toJsonReport,
} from './reporter.js';
export type { ReportStyle, JsonReport, JsonCase, JsonRun } from './reporter.js';
