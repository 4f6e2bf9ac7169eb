import type { Command } from '../types.js';
import { loadConfig, validateConfig } from '../../config/loader.js';
import { usageError } from '../utils.js';

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: 'lectern config <show|validate>',
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        const config = loadConfig();
        console.log(JSON.stringify(config, null, 2));
        break;
      }
      case 'validate': {
        const config = loadConfig();
        const errors = validateConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(1);
        }
        break;
      }
      default:
        usageError('Unknown subcommand', configCommand.usage);
    }
  },
};
