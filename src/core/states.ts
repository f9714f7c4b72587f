/**
 * Genotype category vocabularies
 *
 * The tuple order of TRUTH_STATES is the canonical column order of every
 * scheme row. Rows are populated positionally, so reordering this tuple
 * changes the meaning of every table.
 */

import { z } from 'zod';
import { createValidationError } from './errors.js';

// =============================================================================
// TRUTH STATES
// =============================================================================

/**
 * Truth genotype categories. Truth sets are normalized to at most two distinct
 * alleles, so there are no third/fourth allele states here.
 */
export const TRUTH_STATES = [
  'MISSING',
  'HOM_REF',
  'HET_REF_VAR1',
  'HET_VAR1_VAR2',
  'HOM_VAR1',
  'NO_CALL',
  'LOW_GQ',
  'LOW_DP',
  'VC_FILTERED',
  'GT_FILTERED',
  'IS_MIXED',
] as const;

export type TruthState = (typeof TRUTH_STATES)[number];

// =============================================================================
// CALL STATES
// =============================================================================

/**
 * Call genotype categories. A superset of the truth states: the callset under
 * evaluation may report a third or fourth distinct allele at a site.
 */
export const CALL_STATES = [
  'MISSING',
  'HOM_REF',
  'HET_REF_VAR1',
  'HET_REF_VAR2',
  'HET_REF_VAR3',
  'HET_VAR1_VAR2',
  'HET_VAR1_VAR3',
  'HET_VAR3_VAR4',
  'HOM_VAR1',
  'HOM_VAR2',
  'HOM_VAR3',
  'NO_CALL',
  'LOW_GQ',
  'LOW_DP',
  'VC_FILTERED',
  'GT_FILTERED',
  'IS_MIXED',
] as const;

export type CallState = (typeof CALL_STATES)[number];

// =============================================================================
// CONTINGENCY STATES
// =============================================================================

/**
 * Contingency table outcomes. EMPTY means the pair contributes nothing; NA
 * means the pair cannot occur once upstream normalization has run.
 */
export const CONTINGENCY_STATES = ['TP', 'FP', 'TN', 'FN', 'EMPTY', 'NA'] as const;

export type ContingencyState = (typeof CONTINGENCY_STATES)[number];

/** Outcomes that are counted by the aggregation step */
export type CountableState = Exclude<ContingencyState, 'EMPTY' | 'NA'>;

// =============================================================================
// SCHEMAS & GUARDS
// =============================================================================

export const truthStateSchema = z.enum(TRUTH_STATES);
export const callStateSchema = z.enum(CALL_STATES);
export const contingencyStateSchema = z.enum(CONTINGENCY_STATES);

export function isTruthState(value: unknown): value is TruthState {
  return truthStateSchema.safeParse(value).success;
}

export function isCallState(value: unknown): value is CallState {
  return callStateSchema.safeParse(value).success;
}

export function isContingencyState(value: unknown): value is ContingencyState {
  return contingencyStateSchema.safeParse(value).success;
}

export function isCountableState(state: ContingencyState): state is CountableState {
  return state !== 'EMPTY' && state !== 'NA';
}

/**
 * Ordinal position of a truth state, i.e. its column in a scheme row
 */
export function truthOrdinal(state: TruthState): number {
  return TRUTH_STATES.indexOf(state);
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Normalize user-supplied state names: `het-ref-var1` and `Het_Ref_Var1` both
 * become `HET_REF_VAR1`.
 */
function normalizeStateName(input: string): string {
  return input.trim().toUpperCase().replace(/-/g, '_');
}

export function parseTruthState(input: string): TruthState {
  const result = truthStateSchema.safeParse(normalizeStateName(input));
  if (!result.success) {
    throw createValidationError(
      'truthState',
      `unknown truth state '${input}'`,
      `Use one of ${TRUTH_STATES.join(', ')}`
    );
  }
  return result.data;
}

export function parseCallState(input: string): CallState {
  const result = callStateSchema.safeParse(normalizeStateName(input));
  if (!result.success) {
    throw createValidationError(
      'callState',
      `unknown call state '${input}'`,
      `Use one of ${CALL_STATES.join(', ')}`
    );
  }
  return result.data;
}
