import type { Command } from '../types.js';
import { parseInteger, usageError } from '../utils.js';
import { GAP_SEQUENCES, collectGaps, isGapSequenceName } from '../../shellsort/gap-sequences.js';
import { formatSequence } from '../../bench/reporter.js';

const NAMES = Object.keys(GAP_SEQUENCES).join('|');

export const gapsCommand: Command = {
  name: 'gaps',
  description: 'Print the shellsort gaps for an input length',
  usage: `sortbench gaps <${NAMES}> <length>`,
  handler: async (args) => {
    if (args.includes('--help') || args.includes('-h')) {
      console.log(gapsCommand.usage);
      return;
    }

    const [name, lengthArg] = args;
    if (name === undefined || !isGapSequenceName(name)) {
      return usageError(`Unknown gap sequence: ${name ?? '(none)'}`, gapsCommand.usage);
    }
    const length = parseInteger(lengthArg);
    if (length === undefined || length < 0) {
      return usageError('Length must be a non-negative integer', gapsCommand.usage);
    }

    console.log(formatSequence(collectGaps(GAP_SEQUENCES[name], length)));
  },
};
