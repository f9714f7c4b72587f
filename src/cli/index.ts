/**
 * CLI Main Program
 *
 * Commander.js program setup for the genotype-concordance CLI.
 */

import { Command, CommanderError, Option } from 'commander';
import { VERSION } from '../version.js';
import { OUTPUT_FORMATS } from './utils/output.js';
import { addTableCommand } from './commands/table.js';
import { addClassifyCommand } from './commands/classify.js';
import { addValidateCommand } from './commands/validate.js';
import { addEnvCommand } from './commands/env.js';
import { handleCliError } from './utils/errors.js';
import { createUsageError } from '../core/errors.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('genotype-concordance')
    .description('Genotype concordance classification tables for variant-calling benchmarks')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('json')
    )
    .option('--missing-as-no-call', 'Score sites missing from the truth set as no-calls')
    .option('--no-missing-as-no-call', 'Score sites missing from the truth set as homozygous reference')
    // usage errors are thrown and reported by parseCli; the JSON report replaces commander's line
    .exitOverride()
    .configureOutput({ outputError: () => {} });

  // subcommands inherit the exit and output settings above
  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  addTableCommand(program);
  addClassifyCommand(program);
  addValidateCommand(program);
  addEnvCommand(program);
}

/**
 * Parse `argv` with `program`. Help and version output end normally; any
 * other commander error is a usage error (exit 2).
 */
export async function parseCli(program: Command, argv: readonly string[]): Promise<void> {
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (error.exitCode === 0) {
      return;
    }
    handleCliError(createUsageError(error.message, error.code));
  }
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  await parseCli(createProgram(), argv);
}
