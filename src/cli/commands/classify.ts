/**
 * Classify CLI Command
 *
 * Classify a single (truth state, call state) pair.
 */

import type { Command } from 'commander';
import { parseCallState, parseTruthState } from '../../core/states.js';
import { createClassifier } from '../../services/classifier.service.js';
import { formatOutput } from '../utils/output.js';
import { getGlobalOptions } from '../utils/options.js';
import { handleCliError } from '../utils/errors.js';

export function addClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Classify one truth/call genotype pair')
    .argument('<truth>', 'Truth state, e.g. HOM_REF or het-ref-var1')
    .argument('<call>', 'Call state, e.g. HOM_VAR1')
    .action((truthArg: string, callArg: string, _options: unknown, cmd: Command) => {
      try {
        const globalOpts = getGlobalOptions(cmd);
        const truth = parseTruthState(truthArg);
        const call = parseCallState(callArg);
        const classifier = createClassifier({ missingAsNoCall: globalOpts.missingAsNoCall });

        const result = {
          policy: classifier.policy,
          truth,
          call,
          rendered: classifier.describe(truth, call),
          outcomes: [...classifier.classify(truth, call)],
        };

        console.log(formatOutput(result, globalOpts.format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
