/**
 * Table CLI Command
 *
 * Print the full classification table of the selected scheme.
 */

import type { Command } from 'commander';
import { CALL_STATES, TRUTH_STATES } from '../../core/states.js';
import { createClassifier, type IConcordanceClassifier } from '../../services/classifier.service.js';
import { formatArrayAsTable, formatOutput } from '../utils/output.js';
import { getGlobalOptions } from '../utils/options.js';
import { handleCliError } from '../utils/errors.js';

/**
 * One line per call state, one column per truth state
 */
export function buildTableMatrix(classifier: IConcordanceClassifier): Record<string, string>[] {
  return CALL_STATES.map((call) => {
    const row: Record<string, string> = { call };
    for (const truth of TRUTH_STATES) {
      row[truth] = classifier.describe(truth, call);
    }
    return row;
  });
}

export function addTableCommand(program: Command): void {
  program
    .command('table')
    .description('Print the classification table (rows: call state, columns: truth state)')
    .action((_options: unknown, cmd: Command) => {
      try {
        const globalOpts = getGlobalOptions(cmd);
        const classifier = createClassifier({ missingAsNoCall: globalOpts.missingAsNoCall });

        if (globalOpts.format === 'table') {
          console.log(`Scheme: ${classifier.policy}\n`);
          console.log(formatArrayAsTable(buildTableMatrix(classifier), ['call', ...TRUTH_STATES]));
          return;
        }

        console.log(formatOutput({ policy: classifier.policy, rows: classifier.table() }, 'json'));
      } catch (error) {
        handleCliError(error);
      }
    });
}
