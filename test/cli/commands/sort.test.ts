/**
 * Tests for the sort CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { sortCommand } from '../../../src/cli/commands/sort.js';

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('sortCommand', () => {
  it('has correct name and usage', () => {
    expect(sortCommand.name).toBe('sort');
    expect(sortCommand.usage).toContain('--algorithm');
  });

  it('sorts with the default algorithm', async () => {
    await sortCommand.handler(['3', '-1', '2']);

    expect(console.log).toHaveBeenCalledWith('[-1, 2, 3]');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('sorts with the chosen algorithm', async () => {
    await sortCommand.handler(['-a', 'gnome', '5', '4', '5']);

    expect(console.log).toHaveBeenCalledWith('[4, 5, 5]');
  });

  it('takes the algorithm flag after the numbers', async () => {
    await sortCommand.handler(['9', '1', '--algorithm', 'mergesort-bottomup']);

    expect(console.log).toHaveBeenCalledWith('[1, 9]');
  });

  it('prints an empty sequence for no numbers', async () => {
    await sortCommand.handler([]);

    expect(console.log).toHaveBeenCalledWith('[]');
  });

  it('exits 2 for a value that is not an integer', async () => {
    await sortCommand.handler(['1', '2.5']);

    expect(console.error).toHaveBeenCalledWith('Error: Not an integer: 2.5');
    expect(console.log).toHaveBeenCalledWith('Usage: sortbench sort [--algorithm <id>] <numbers...>');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('exits 2 for an unknown algorithm', async () => {
    await sortCommand.handler(['-a', 'bogosort', '1']);

    expect(console.error).toHaveBeenCalledWith(
      'Error: Unknown algorithm: bogosort. Run "sortbench list" for the ids.',
    );
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('exits 2 for a missing algorithm id', async () => {
    await sortCommand.handler(['--algorithm']);

    expect(console.error).toHaveBeenCalledWith('Error: --algorithm expects an id');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
