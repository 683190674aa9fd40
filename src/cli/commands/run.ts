/**
 * CLI command: sortbench run
 *
 * Runs every selected algorithm on the literal inputs and one random input
 * per configured size, printing one line per run as it finishes.
 */

import type { Command } from '../types.js';
import { parseInteger, parseIntegerList, splitList, usageError } from '../utils.js';
import { loadConfig, toBenchSettings, type BenchSettings, type ExternalConfig } from '../../config/loader.js';
import { buildCases } from '../../bench/input-generator.js';
import { runSuite } from '../../bench/runner.js';
import {
  formatCaseHeader,
  formatRun,
  formatSkipped,
  formatSummary,
  toJsonReport,
  type ReportStyle,
} from '../../bench/reporter.js';
import { isConfigError } from '../../utils/errors.js';
import { setLogLevel } from '../../utils/logger.js';

type BenchOverrides = NonNullable<ExternalConfig['bench']>;

export const runCommand: Command = {
  name: 'run',
  description: 'Run the sort benchmark',
  usage: `sortbench run [options]

Options:
  --sizes <list>        Comma-separated random input lengths (default: 6,1000,10000,100000)
  --skip-slowest        Leave quadratic sorts out of inputs longer than --slow-limit
  --slow-limit <n>      Length above which --skip-slowest applies (default: 10000)
  --seed <n>            Seed for the random inputs (default: current time)
  --only <ids>          Comma-separated algorithm ids (see "sortbench list")
  --no-literals         Skip the fixed literal inputs
  --print-threshold <n> Print sequences up to this length (default: 20)
  --json                Print a JSON report instead of text`,
  handler: async (args) => {
    const overrides: BenchOverrides = {};
    let json = false;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      switch (arg) {
        case '--sizes': {
          const sizes = parseIntegerList(args[++i]);
          if (!sizes) return usageError('--sizes expects a comma-separated list of integers', runCommand.usage);
          overrides.sizes = sizes;
          break;
        }
        case '--skip-slowest':
          overrides.skipSlowest = true;
          break;
        case '--slow-limit': {
          const slowLimit = parseInteger(args[++i]);
          if (slowLimit === undefined) return usageError('--slow-limit expects an integer', runCommand.usage);
          overrides.slowLimit = slowLimit;
          break;
        }
        case '--seed': {
          const seed = parseInteger(args[++i]);
          if (seed === undefined) return usageError('--seed expects an integer', runCommand.usage);
          overrides.seed = seed;
          break;
        }
        case '--only': {
          const value = args[++i];
          if (value === undefined) return usageError('--only expects a list of algorithm ids', runCommand.usage);
          overrides.only = splitList(value);
          break;
        }
        case '--no-literals':
          overrides.includeLiterals = false;
          break;
        case '--print-threshold': {
          const threshold = parseInteger(args[++i]);
          if (threshold === undefined) return usageError('--print-threshold expects an integer', runCommand.usage);
          overrides.printThreshold = threshold;
          break;
        }
        case '--json':
          json = true;
          break;
        case '--help':
        case '-h':
          console.log(runCommand.usage);
          return;
        default:
          return usageError(`Unknown option: ${arg}`, runCommand.usage);
      }
    }

    const config = loadConfig({ cliOverrides: { bench: overrides } });
    if (config.logging.level) setLogLevel(config.logging.level);

    let settings: BenchSettings;
    try {
      settings = toBenchSettings(config);
    } catch (error) {
      if (isConfigError(error)) {
        console.error(`Error: ${error.message}`);
        process.exit(3);
        return;
      }
      throw error;
    }

    const style: ReportStyle = { printThreshold: settings.printThreshold };
    const cases = buildCases(settings);

    const report = runSuite(cases, {
      ...settings,
      onCase: json
        ? undefined
        : (benchCase, skipped) => {
            console.log(formatCaseHeader(benchCase, style));
            if (skipped.length > 0) console.log(`  ${formatSkipped(skipped, style)}`);
          },
      onRun: json ? undefined : (run) => console.log(`  ${formatRun(run, style)}`),
    });

    if (json) {
      console.log(JSON.stringify(toJsonReport(report), null, 2));
    } else {
      console.log('');
      console.log(formatSummary(report, style));
    }

    if (report.failures > 0) {
      process.exit(1);
    }
  },
};
