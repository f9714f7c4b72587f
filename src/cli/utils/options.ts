/**
 * Typed global options for Commander.js
 *
 * Commander.js returns loosely typed option bags from optsWithGlobals().
 * The bag is validated with Zod here so command handlers get real types.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { OUTPUT_FORMATS, type OutputFormat } from './output.js';
import { createValidationError } from '../../core/errors.js';

/**
 * Global CLI options available to all commands via --option flags
 */
export interface GlobalOptions {
  /** Output format: json or table */
  format: OutputFormat;
  /** Missing-site convention; undefined means "use config" */
  missingAsNoCall?: boolean;
}

const globalOptionsSchema = z.object({
  format: z.enum(OUTPUT_FORMATS).default('json'),
  missingAsNoCall: z.boolean().optional(),
});

/**
 * Read and validate the global options of the program that owns `cmd`
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const result = globalOptionsSchema.safeParse(cmd.optsWithGlobals());
  if (!result.success) {
    throw createValidationError('options', result.error.issues.map((i) => i.message).join('; '));
  }
  return result.data;
}
