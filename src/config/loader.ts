/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (SORTBENCH_*)
 * 3. Project config file (./sortbench.config.json)
 * 4. User config file (~/.sortbench/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isAlgorithmId, type AlgorithmId } from '../registry/algorithm-registry.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger, isLogLevel, type LogLevel } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  bench?: {
    /** Lengths of the random inputs, one case each. */
    sizes?: number[];
    /** Inputs longer than this count as large for --skip-slowest. */
    slowLimit?: number;
    /** Skip quadratic algorithms on large inputs. */
    skipSlowest?: boolean;
    /** Seed for the random inputs. Default: current time. */
    seed?: number;
    /** Sequences up to this length are printed in reports. */
    printThreshold?: number;
    /** Run the fixed literal inputs before the random ones. */
    includeLiterals?: boolean;
    /** Restrict the run to these algorithm ids. */
    only?: string[];
  };
  logging?: {
    level?: LogLevel;
  };
}

/** Default external config values */
export const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  bench: {
    sizes: [6, 1_000, 10_000, 100_000],
    slowLimit: 10_000,
    skipSlowest: false,
    printThreshold: 20,
    includeLiterals: true,
  },
  logging: {
    level: 'info',
  },
};

/** Fully resolved settings the harness runs with. */
export interface BenchSettings {
  sizes: number[];
  slowLimit: number;
  skipSlowest: boolean;
  seed: number;
  printThreshold: number;
  includeLiterals: boolean;
  only?: AlgorithmId[];
}

/**
 * Expand a leading ~ to the home directory.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Pick the known fields out of parsed JSON. Fields of the wrong type are
 * dropped with a warning.
 */
export function parseExternalConfig(value: unknown, source = 'config'): ExternalConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${source} must be a JSON object`, 'CONFIG_INVALID');
  }

  const config: ExternalConfig = {};
  const dropped: string[] = [];

  const bench = value.bench;
  if (isRecord(bench)) {
    config.bench = {};
    const { sizes, slowLimit, skipSlowest, seed, printThreshold, includeLiterals, only } = bench;

    if (isNumberArray(sizes)) config.bench.sizes = sizes;
    else if (sizes !== undefined) dropped.push('bench.sizes');

    if (typeof slowLimit === 'number') config.bench.slowLimit = slowLimit;
    else if (slowLimit !== undefined) dropped.push('bench.slowLimit');

    if (typeof skipSlowest === 'boolean') config.bench.skipSlowest = skipSlowest;
    else if (skipSlowest !== undefined) dropped.push('bench.skipSlowest');

    if (typeof seed === 'number') config.bench.seed = seed;
    else if (seed !== undefined) dropped.push('bench.seed');

    if (typeof printThreshold === 'number') config.bench.printThreshold = printThreshold;
    else if (printThreshold !== undefined) dropped.push('bench.printThreshold');

    if (typeof includeLiterals === 'boolean') config.bench.includeLiterals = includeLiterals;
    else if (includeLiterals !== undefined) dropped.push('bench.includeLiterals');

    if (isStringArray(only)) config.bench.only = only;
    else if (only !== undefined) dropped.push('bench.only');
  } else if (bench !== undefined) {
    dropped.push('bench');
  }

  const logging = value.logging;
  if (isRecord(logging)) {
    config.logging = {};
    const level = logging.level;
    if (typeof level === 'string' && isLogLevel(level)) config.logging.level = level;
    else if (level !== undefined) dropped.push('logging.level');
  } else if (logging !== undefined) {
    dropped.push('logging');
  }

  if (dropped.length > 0) {
    log.warn(`Ignoring malformed fields in ${source}`, { fields: dropped });
  }

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return parseExternalConfig(JSON.parse(content), resolvedPath);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load config from environment variables.
 * Variables are prefixed with SORTBENCH_ and use underscores for nesting.
 * Examples:
 *   SORTBENCH_BENCH_SIZES=1000,10000
 *   SORTBENCH_BENCH_SKIP_SLOWEST=true
 *   SORTBENCH_LOG_LEVEL=debug
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): ExternalConfig {
  const config: ExternalConfig = {};

  if (env.SORTBENCH_BENCH_SIZES) {
    config.bench = config.bench ?? {};
    config.bench.sizes = parseList(env.SORTBENCH_BENCH_SIZES).map((s) => Number(s));
  }
  if (env.SORTBENCH_BENCH_SLOW_LIMIT) {
    config.bench = config.bench ?? {};
    config.bench.slowLimit = parseInt(env.SORTBENCH_BENCH_SLOW_LIMIT, 10);
  }
  if (env.SORTBENCH_BENCH_SKIP_SLOWEST) {
    config.bench = config.bench ?? {};
    config.bench.skipSlowest = env.SORTBENCH_BENCH_SKIP_SLOWEST === 'true';
  }
  if (env.SORTBENCH_BENCH_SEED) {
    config.bench = config.bench ?? {};
    config.bench.seed = parseInt(env.SORTBENCH_BENCH_SEED, 10);
  }
  if (env.SORTBENCH_BENCH_PRINT_THRESHOLD) {
    config.bench = config.bench ?? {};
    config.bench.printThreshold = parseInt(env.SORTBENCH_BENCH_PRINT_THRESHOLD, 10);
  }
  if (env.SORTBENCH_BENCH_INCLUDE_LITERALS) {
    config.bench = config.bench ?? {};
    config.bench.includeLiterals = env.SORTBENCH_BENCH_INCLUDE_LITERALS === 'true';
  }
  if (env.SORTBENCH_BENCH_ONLY) {
    config.bench = config.bench ?? {};
    config.bench.only = parseList(env.SORTBENCH_BENCH_ONLY);
  }

  const level = env.SORTBENCH_LOG_LEVEL;
  if (isLogLevel(level)) {
    config.logging = { level };
  }

  return config;
}

/**
 * Merge two configs section by section, with source overriding target.
 */
function mergeConfig(target: ExternalConfig, source: ExternalConfig): ExternalConfig {
  return {
    bench: { ...target.bench, ...source.bench },
    logging: { ...target.logging, ...source.logging },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];
  const bench = config.bench;

  if (bench?.sizes !== undefined) {
    if (bench.sizes.some((size) => !Number.isInteger(size) || size < 0)) {
      errors.push('bench.sizes must contain non-negative integers');
    }
  }
  if (bench?.slowLimit !== undefined) {
    if (!Number.isInteger(bench.slowLimit) || bench.slowLimit < 0) {
      errors.push('bench.slowLimit must be a non-negative integer');
    }
  }
  if (bench?.seed !== undefined) {
    if (!Number.isInteger(bench.seed)) {
      errors.push('bench.seed must be an integer');
    }
  }
  if (bench?.printThreshold !== undefined) {
    if (!Number.isInteger(bench.printThreshold) || bench.printThreshold < 0) {
      errors.push('bench.printThreshold must be a non-negative integer');
    }
  }
  if (bench?.only !== undefined) {
    for (const id of bench.only) {
      if (!isAlgorithmId(id)) {
        errors.push(`bench.only contains unknown algorithm "${id}"`);
      }
    }
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config: ExternalConfig = mergeConfig(EXTERNAL_DEFAULTS, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.sortbench/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'sortbench.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig(options.env ?? process.env));
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = mergeConfig(config, options.cliOverrides);
  }

  return {
    bench: config.bench ?? {},
    logging: config.logging ?? {},
  };
}

/**
 * Resolve the external config into the settings the harness runs with.
 * Throws ConfigError if the config does not validate.
 */
export function toBenchSettings(
  config: Required<ExternalConfig>,
  fallbackSeed: number = Date.now(),
): BenchSettings {
  const errors = validateExternalConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const defaults = EXTERNAL_DEFAULTS.bench;
  const bench = config.bench;
  const only = bench.only?.filter(isAlgorithmId);

  return {
    sizes: [...(bench.sizes ?? defaults.sizes ?? [])],
    slowLimit: bench.slowLimit ?? defaults.slowLimit ?? 0,
    skipSlowest: bench.skipSlowest ?? defaults.skipSlowest ?? false,
    seed: bench.seed ?? fallbackSeed,
    printThreshold: bench.printThreshold ?? defaults.printThreshold ?? 0,
    includeLiterals: bench.includeLiterals ?? defaults.includeLiterals ?? true,
    only: only && only.length > 0 ? only : undefined,
  };
}
