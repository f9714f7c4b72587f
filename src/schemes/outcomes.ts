/**
 * Outcome shorthands for writing scheme tables. Each name lists its members
 * in order; NA marks a pair that should never be observed.
 */

import type { ContingencyState } from '../core/states.js';
import type { OutcomeSequence } from '../core/scheme.js';

function outcomes(...states: ContingencyState[]): OutcomeSequence {
  return Object.freeze(states);
}

export const NA = outcomes('NA');
export const EMPTY = outcomes('EMPTY');
export const TP_ONLY = outcomes('TP');
export const FP_ONLY = outcomes('FP');
export const TN_ONLY = outcomes('TN');
export const FN_ONLY = outcomes('FN');
export const TP_FN = outcomes('TP', 'FN');
export const TP_FP = outcomes('TP', 'FP');
export const TP_TN = outcomes('TP', 'TN');
export const FP_FN = outcomes('FP', 'FN');
export const FP_TN = outcomes('FP', 'TN');
export const FP_TN_FN = outcomes('FP', 'TN', 'FN');
export const TP_FP_FN = outcomes('TP', 'FP', 'FN');
export const TN_FN = outcomes('TN', 'FN');
