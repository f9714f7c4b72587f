/**
 * Concordance Classifier Service
 *
 * Per-site entry point for the aggregation loop. Wraps a validated scheme and
 * turns each (truth, call) pair into the set of outcomes to count.
 */

import { createComponentLogger } from '../utils/logger.js';
import { config as appConfig } from '../config/index.js';
import { UnreachableComparisonError } from '../core/errors.js';
import { CALL_STATES, TRUTH_STATES, isCountableState } from '../core/states.js';
import type { CallState, CountableState, TruthState } from '../core/states.js';
import type { SchemePolicy, ValidatedScheme } from '../core/scheme.js';
import { getScheme } from '../schemes/factory.js';

const logger = createComponentLogger('classifier');

// =============================================================================
// TYPES
// =============================================================================

export interface ClassifierServiceConfig {
  /** Score truth sites absent from the truth set as no-calls */
  missingAsNoCall: boolean;
  /** Throw on NA pairs instead of logging and counting nothing */
  strictUnreachable: boolean;
}

export interface ClassificationRow {
  truth: TruthState;
  call: CallState;
  outcomes: string;
}

export interface IConcordanceClassifier {
  readonly policy: SchemePolicy;
  classify(truthState: TruthState, callState: CallState): ReadonlySet<CountableState>;
  describe(truthState: TruthState, callState: CallState): string;
  table(): ClassificationRow[];
}

// =============================================================================
// CLASSIFIER
// =============================================================================

export class ConcordanceClassifier implements IConcordanceClassifier {
  constructor(
    private readonly scheme: ValidatedScheme,
    private readonly strictUnreachable: boolean = true
  ) {}

  get policy(): SchemePolicy {
    return this.scheme.policy;
  }

  /**
   * Outcomes to count for one site. EMPTY pairs yield an empty set.
   *
   * @throws UnreachableComparisonError when the pair is NA and strict mode is on
   */
  classify(truthState: TruthState, callState: CallState): ReadonlySet<CountableState> {
    const outcomes = this.scheme.asSet(this.scheme.lookup(truthState, callState));

    if (outcomes.has('NA')) {
      logger.error(
        { truthState, callState, policy: this.policy },
        'Unreachable genotype comparison observed'
      );
      if (this.strictUnreachable) {
        throw new UnreachableComparisonError(truthState, callState, { policy: this.policy });
      }
      return new Set<CountableState>();
    }

    return new Set([...outcomes].filter(isCountableState));
  }

  describe(truthState: TruthState, callState: CallState): string {
    return this.scheme.render(truthState, callState);
  }

  /**
   * Every pair of the scheme, call states outer and truth states inner
   */
  table(): ClassificationRow[] {
    return CALL_STATES.flatMap((call) =>
      TRUTH_STATES.map((truth) => ({ truth, call, outcomes: this.describe(truth, call) }))
    );
  }
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Build, validate and wrap the scheme for the configured convention.
 * Options not given fall back to the application config.
 */
export function createClassifier(
  options: Partial<ClassifierServiceConfig> = {}
): ConcordanceClassifier {
  const missingAsNoCall = options.missingAsNoCall ?? appConfig.concordance.missingAsNoCall;
  const strictUnreachable = options.strictUnreachable ?? appConfig.concordance.strictUnreachable;

  const scheme = getScheme(missingAsNoCall).validate();
  logger.debug({ policy: scheme.policy, strictUnreachable }, 'Concordance classifier created');

  return new ConcordanceClassifier(scheme, strictUnreachable);
}
