/**
 * Tests for CLI dispatch.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { VERSION, commands, main } from '../../src/cli/main.js';

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

function logged(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
}

describe('main', () => {
  it('registers the commands in order', () => {
    expect(commands.map((c) => c.name)).toEqual(['run', 'list', 'sort', 'gaps', 'config']);
  });

  it('prints the version', async () => {
    await main(['--version']);

    expect(console.log).toHaveBeenCalledWith(`sortbench ${VERSION}`);
  });

  it('shows help without arguments', async () => {
    await main([]);

    const lines = logged();
    expect(lines[0]).toBe('sortbench - comparison sort benchmark');
    expect(lines).toContain('Usage: sortbench <command> [options]');
    expect(lines).toContain(`  ${'gaps'.padEnd(16)} Print the shellsort gaps for an input length`);
  });

  it('shows help for --help', async () => {
    await main(['--help']);

    expect(console.log).toHaveBeenCalledWith('Usage: sortbench <command> [options]');
  });

  it('dispatches to the named command', async () => {
    await main(['gaps', 'hibbard', '10']);

    expect(console.log).toHaveBeenCalledWith('[1, 3, 7]');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('exits 2 for an unknown command', async () => {
    await main(['bench']);

    expect(console.error).toHaveBeenCalledWith('Unknown command: bench');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('exits 1 when a handler throws', async () => {
    const list = commands.find((c) => c.name === 'list');
    if (!list) throw new Error('list command missing');
    vi.spyOn(list, 'handler').mockRejectedValue(new Error('boom'));

    await main(['list']);

    expect(console.error).toHaveBeenCalledWith('Error: boom');
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
