#!/usr/bin/env node
/**
 * sortbench Command-Line Interface
 *
 * Usage: sortbench <command> [options]
 */

import { main } from './main.js';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
