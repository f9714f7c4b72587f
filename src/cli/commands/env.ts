/**
 * Env CLI Command
 *
 * List the environment variables the configuration reads.
 */

import type { Command } from 'commander';
import { configRegistry, getAllEnvVars } from '../../config/index.js';
import { formatOutput } from '../utils/output.js';
import { getGlobalOptions } from '../utils/options.js';
import { handleCliError } from '../utils/errors.js';

export function addEnvCommand(program: Command): void {
  program
    .command('env')
    .description('List supported environment variables and their defaults')
    .action((_options: unknown, cmd: Command) => {
      try {
        const globalOpts = getGlobalOptions(cmd);
        console.log(formatOutput(getAllEnvVars(configRegistry), globalOpts.format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
