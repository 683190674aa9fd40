import type { Command } from '../types.js';
import { usageError } from '../utils.js';
import { getAllAlgorithms } from '../../registry/algorithm-registry.js';

export const listCommand: Command = {
  name: 'list',
  description: 'List the available algorithms',
  usage: 'sortbench list [--json]',
  handler: async (args) => {
    let json = false;
    for (const arg of args) {
      if (arg === '--json') {
        json = true;
      } else if (arg === '--help' || arg === '-h') {
        console.log(listCommand.usage);
        return;
      } else {
        return usageError(`Unknown option: ${arg}`, listCommand.usage);
      }
    }

    const algorithms = getAllAlgorithms();

    if (json) {
      const entries = algorithms.map(({ id, label, family, stable, quadratic }) => ({
        id,
        label,
        family,
        stable,
        quadratic,
      }));
      console.log(JSON.stringify(entries, null, 2));
      return;
    }

    const width = Math.max(...algorithms.map((a) => a.id.length));
    for (const algorithm of algorithms) {
      const flags = [algorithm.stable ? 'stable' : null, algorithm.quadratic ? 'quadratic' : null]
        .filter((flag): flag is string => flag !== null)
        .join(', ');
      const suffix = flags ? ` (${flags})` : '';
      console.log(`  ${algorithm.id.padEnd(width)}  ${algorithm.label}${suffix}`);
    }
  },
};
