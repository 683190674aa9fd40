/**
 * Command dispatch for the sortbench CLI.
 */

import type { Command } from './types.js';
import { runCommand } from './commands/run.js';
import { listCommand } from './commands/list.js';
import { sortCommand } from './commands/sort.js';
import { gapsCommand } from './commands/gaps.js';
import { configCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export const commands: Command[] = [runCommand, listCommand, sortCommand, gapsCommand, configCommand];

export function showHelp(): void {
  console.log('sortbench - comparison sort benchmark');
  console.log('');
  console.log('Usage: sortbench <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "sortbench <command> --help" for command-specific help.');
}

export async function main(args: string[]): Promise<void> {
  const commandName = args[0];

  // Global flags apply only before a command name
  if (commandName === '--version' || commandName === '-v') {
    console.log(`sortbench ${VERSION}`);
    return;
  }

  if (commandName === undefined || commandName === '--help' || commandName === '-h') {
    showHelp();
    return;
  }

  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "sortbench --help" for available commands.');
    process.exit(2);
    return;
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
