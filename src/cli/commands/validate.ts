/**
 * Validate CLI Command
 *
 * Build every scheme variant and check it covers all (truth, call) pairs.
 */

import type { Command } from 'commander';
import { SCHEME_POLICIES } from '../../core/scheme.js';
import { buildScheme } from '../../schemes/factory.js';
import { formatOutput } from '../utils/output.js';
import { getGlobalOptions } from '../utils/options.js';
import { handleCliError } from '../utils/errors.js';

export interface SchemeValidationReport {
  policy: string;
  pairs: number;
  valid: boolean;
}

/**
 * Validate every scheme variant. The first incomplete scheme throws.
 */
export function validateAllSchemes(): SchemeValidationReport[] {
  return SCHEME_POLICIES.map((policy) => {
    const scheme = buildScheme(policy).validate();
    return { policy, pairs: scheme.size, valid: true };
  });
}

export function addValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate that every scheme variant is exhaustive')
    .action((_options: unknown, cmd: Command) => {
      try {
        const globalOpts = getGlobalOptions(cmd);
        console.log(formatOutput(validateAllSchemes(), globalOpts.format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
