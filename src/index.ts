/**
 * sortbench
 *
 * In-place comparison sorts over mutable indexable sequences, with a
 * benchmark harness that times and checks them.
 *
 * @packageDocumentation
 */

// Primitives
export * from './core/index.js';

// Algorithms
export * from './elementary/index.js';
export * from './shellsort/index.js';
export * from './mergesort/index.js';
export * from './heapsort/index.js';
export * from './quicksort/index.js';
export { builtinSort } from './builtin/builtin-sort.js';

// Registry
export {
  ALGORITHM_IDS,
  ALGORITHM_REGISTRY,
  isAlgorithmId,
  findAlgorithm,
  getAlgorithm,
  getAllAlgorithms,
} from './registry/algorithm-registry.js';
export type {
  AlgorithmFamily,
  AlgorithmId,
  SortAlgorithm,
  SortFunction,
} from './registry/algorithm-registry.js';

// Benchmark harness
export * from './bench/index.js';

// Configuration
export {
  loadConfig,
  validateExternalConfig,
  parseExternalConfig,
  toBenchSettings,
  EXTERNAL_DEFAULTS,
} from './config/loader.js';
export type { ExternalConfig, BenchSettings, LoadConfigOptions } from './config/loader.js';

// Utilities
export { createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export {
  SortbenchError,
  OrderingError,
  GapSequenceError,
  BenchmarkError,
  ConfigError,
  isErrorWithCode,
  isOrderingError,
  isGapSequenceError,
  isBenchmarkError,
  isConfigError,
  wrapError,
} from './utils/errors.js';
