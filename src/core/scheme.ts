/**
 * Genotype concordance scheme
 *
 * Defines, for every (truth state, call state) pair, the contingency table
 * entries that a comparison of that pair contributes to. A single comparison
 * may contribute to several entries: a HET_VAR1_VAR2 call against a HOM_VAR1
 * truth is one TP (the shared allele), one FP (the extra called allele) and one
 * FN (the second truth allele that was not called).
 *
 * Lifecycle: constructed -> populated (addRow) -> validated -> in use.
 * `validate()` returns a ValidatedScheme, the only view whose lookups are
 * total. The build-time scheme can only answer "maybe".
 */

import { TruthAndCallStates } from './comparison-key.js';
import {
  CALL_STATES,
  TRUTH_STATES,
  type CallState,
  type ContingencyState,
  type TruthState,
} from './states.js';
import {
  SchemeValidationError,
  createRowArityError,
  createSealedSchemeError,
} from './errors.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('scheme');

// =============================================================================
// TYPES
// =============================================================================

/** Ordered outcomes for one pair. Order is significant only for rendering. */
export type OutcomeSequence = readonly ContingencyState[];

/** One value per element of T, keeping T's length */
type ColumnsOf<T extends readonly unknown[], V> = { readonly [K in keyof T]: V };

/** One outcome sequence per truth state, in canonical column order */
export type SchemeRowOutcomes = ColumnsOf<typeof TRUTH_STATES, OutcomeSequence>;

/** A row literal: the call state followed by its eleven truth columns */
export type SchemeRow = readonly [CallState, ...SchemeRowOutcomes];

export type SchemeTable = readonly SchemeRow[];

/**
 * Variants of the scheme. They differ only in how a truth genotype that is
 * absent from the truth set (MISSING) is scored.
 */
export const SCHEME_POLICIES = ['missing-as-no-call', 'ga4gh'] as const;

export type SchemePolicy = (typeof SCHEME_POLICIES)[number];

/**
 * Read-only access to a scheme that has passed validation
 */
export interface ValidatedScheme {
  readonly policy: SchemePolicy;
  readonly size: number;
  lookup(truthState: TruthState, callState: CallState): OutcomeSequence;
  render(truthState: TruthState, callState: CallState): string;
  asSet(sequence: OutcomeSequence): ReadonlySet<ContingencyState>;
}

// =============================================================================
// HELPERS
// =============================================================================

function renderSequence(sequence: OutcomeSequence): string {
  if (sequence.length === 0 || sequence.every((state) => state === 'EMPTY')) {
    return 'EMPTY';
  }
  return sequence.join(',');
}

function toSet(sequence: OutcomeSequence): ReadonlySet<ContingencyState> {
  return new Set(sequence);
}

// =============================================================================
// SCHEME
// =============================================================================

export class GenotypeConcordanceScheme {
  private readonly entries = new Map<string, OutcomeSequence>();

  /** Set once validation has succeeded; never cleared */
  private validated: ValidatedScheme | undefined;

  constructor(readonly policy: SchemePolicy) {}

  get isValidated(): boolean {
    return this.validated !== undefined;
  }

  /** Number of populated pairs */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Add a row for one call state: exactly one outcome sequence per truth state,
   * in TRUTH_STATES order.
   *
   * @throws SchemeDefinitionError on a column count mismatch, or once the
   *   scheme has been validated
   */
  addRow(callState: CallState, ...sequences: readonly OutcomeSequence[]): void {
    if (this.validated) {
      throw createSealedSchemeError(callState);
    }
    if (sequences.length !== TRUTH_STATES.length) {
      throw createRowArityError(callState, TRUTH_STATES.length, sequences.length);
    }

    TRUTH_STATES.forEach((truthState, column) => {
      const key = new TruthAndCallStates(truthState, callState);
      this.entries.set(key.id, Object.freeze([...sequences[column]]));
    });
  }

  /**
   * Outcome sequence stored for the pair, or undefined if it was never populated
   */
  lookup(truthState: TruthState, callState: CallState): OutcomeSequence | undefined {
    return this.entries.get(TruthAndCallStates.keyOf(truthState, callState));
  }

  /**
   * Parse-able rendering of the pair's outcomes, e.g. "TP,FN", or "EMPTY"
   *
   * @throws SchemeValidationError if the pair was never populated
   */
  render(truthState: TruthState, callState: CallState): string {
    const sequence = this.lookup(truthState, callState);
    if (!sequence) {
      throw new SchemeValidationError(truthState, callState, { policy: this.policy });
    }
    return renderSequence(sequence);
  }

  /**
   * Distinct outcomes of a sequence. Does not assume the input is distinct.
   */
  asSet(sequence: OutcomeSequence): ReadonlySet<ContingencyState> {
    return toSet(sequence);
  }

  /**
   * Check that every (truth, call) pair has an entry, then seal the scheme.
   * Repeated calls after a success return the same view without rescanning.
   *
   * @throws SchemeValidationError naming the first missing pair
   */
  validate(): ValidatedScheme {
    if (this.validated) {
      return this.validated;
    }

    for (const truthState of TRUTH_STATES) {
      for (const callState of CALL_STATES) {
        if (!this.entries.has(TruthAndCallStates.keyOf(truthState, callState))) {
          throw new SchemeValidationError(truthState, callState, { policy: this.policy });
        }
      }
    }

    this.validated = this.createView();
    logger.debug({ policy: this.policy, pairs: this.entries.size }, 'Scheme validated');
    return this.validated;
  }

  private createView(): ValidatedScheme {
    const entries = this.entries;
    const policy = this.policy;

    const lookup = (truthState: TruthState, callState: CallState): OutcomeSequence => {
      const sequence = entries.get(TruthAndCallStates.keyOf(truthState, callState));
      if (!sequence) {
        throw new SchemeValidationError(truthState, callState, { policy });
      }
      return sequence;
    };

    return Object.freeze({
      policy,
      size: entries.size,
      lookup,
      render: (truthState: TruthState, callState: CallState) =>
        renderSequence(lookup(truthState, callState)),
      asSet: toSet,
    });
  }
}
