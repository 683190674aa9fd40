/**
 * CLI command: sortbench sort
 *
 * Sorts the integers given on the command line with one algorithm.
 */

import type { Command } from '../types.js';
import { parseInteger, usageError } from '../utils.js';
import { findAlgorithm, type SortAlgorithm } from '../../registry/algorithm-registry.js';
import { formatSequence } from '../../bench/reporter.js';

const DEFAULT_ALGORITHM = 'quicksort-hoare';

export const sortCommand: Command = {
  name: 'sort',
  description: 'Sort integers given on the command line',
  usage: `sortbench sort [--algorithm <id>] <numbers...>

Options:
  --algorithm, -a <id>  Algorithm to use (default: ${DEFAULT_ALGORITHM})`,
  handler: async (args) => {
    let algorithmId = DEFAULT_ALGORITHM;
    const values: number[] = [];

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--algorithm' || arg === '-a') {
        const id = args[++i];
        if (id === undefined) return usageError('--algorithm expects an id', sortCommand.usage);
        algorithmId = id;
      } else if (arg === '--help' || arg === '-h') {
        console.log(sortCommand.usage);
        return;
      } else {
        const value = parseInteger(arg);
        if (value === undefined) return usageError(`Not an integer: ${arg}`, sortCommand.usage);
        values.push(value);
      }
    }

    const algorithm: SortAlgorithm | undefined = findAlgorithm(algorithmId);
    if (!algorithm) {
      return usageError(`Unknown algorithm: ${algorithmId}. Run "sortbench list" for the ids.`, sortCommand.usage);
    }

    algorithm.sort(values);
    console.log(formatSequence(values));
  },
};
