#!/usr/bin/env node
/**
 * Lectern command-line interface.
 *
 * Usage: lectern <command> [options]
 */

import { run } from './registry.js';

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
