/**
 * Command registry and dispatch for the `lectern` CLI.
 */

import type { Command } from './types.js';
import { ingestCommand } from './commands/ingest.js';
import { searchCommand } from './commands/search.js';
import { purgeCommand } from './commands/purge.js';
import { statsCommand, healthCommand } from './commands/stats.js';
import { configCommand } from './commands/config.js';
import { sanityCommand } from './commands/sanity.js';
import { LecternError, errorMessage } from '../utils/errors.js';
import { getLogLevel } from '../utils/logger.js';

export const VERSION = '0.1.0';

export const commands: Command[] = [
  ingestCommand,
  searchCommand,
  purgeCommand,
  statsCommand,
  healthCommand,
  configCommand,
  sanityCommand,
];

export function showHelp(): void {
  console.log('Lectern - topic retrieval pipeline');
  console.log('');
  console.log('Usage: lectern <command> [options]');
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
  console.log('Run "lectern <command> --help" for command-specific help.');
}

/**
 * Run one CLI invocation. Exits 2 on usage errors, 1 on failures.
 */
export async function run(args: string[]): Promise<void> {
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`lectern ${VERSION}`);
    return;
  }

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "lectern --help" for available commands.');
    process.exit(2);
  }

  const rest = args.slice(1);
  if (rest.includes('--help') || rest.includes('-h')) {
    console.log(`Usage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(rest);
  } catch (error) {
    if (error instanceof LecternError && getLogLevel() === 'debug') {
      console.error(error.toDetailedString());
    } else {
      console.error(`Error: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}
