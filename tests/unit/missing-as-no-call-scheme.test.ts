import { describe, it, expect } from 'vitest';
import { buildScheme } from '../../src/schemes/factory.js';
import { missingAsNoCallTable } from '../../src/schemes/missing-as-no-call.js';
import { CALL_STATES, TRUTH_STATES, type CallState } from '../../src/core/states.js';

const scheme = buildScheme('missing-as-no-call').validate();

function renderRow(call: CallState): string[] {
  return TRUTH_STATES.map((truth) => scheme.render(truth, call));
}

const FILTERED_ROW = ['EMPTY', 'TN', 'TN,FN', 'FN', 'FN', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY'];
const ALL_EMPTY = TRUTH_STATES.map(() => 'EMPTY');

// prettier-ignore
const EXPECTED_ROWS: Array<[CallState, string[]]> = [
  ['MISSING', ['TN', 'TN', 'TN,FN', 'FN', 'FN', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY']],
  ['HOM_REF', ['EMPTY', 'TN', 'TN,FN', 'FN', 'FN', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY']],
  ['HET_REF_VAR1', ['EMPTY', 'FP,TN', 'TP,TN', 'TP,FN', 'TP,FN', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY']],
  ['HET_REF_VAR2', ['NA', 'NA', 'FP,TN,FN', 'NA', 'FP,FN', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA']],
  ['HET_REF_VAR3', ['NA', 'NA', 'NA', 'FP,FN', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA']],
  ['HET_VAR1_VAR2', ['EMPTY', 'FP', 'TP,FP', 'TP', 'TP,FP,FN', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY']],
  ['HET_VAR1_VAR3', ['NA', 'NA', 'NA', 'TP,FP,FN', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA']],
  ['HET_VAR3_VAR4', ['NA', 'FP', 'FP,FN', 'FP,FN', 'FP,FN', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA']],
  ['HOM_VAR1', ['EMPTY', 'FP', 'TP,FP', 'TP,FN', 'TP', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY', 'EMPTY']],
  ['HOM_VAR2', ['NA', 'NA', 'FP,FN', 'TP,FN', 'FP,FN', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA']],
  ['HOM_VAR3', ['NA', 'NA', 'NA', 'FP,FN', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA', 'NA']],
  ['NO_CALL', ALL_EMPTY],
  ['VC_FILTERED', FILTERED_ROW],
  ['GT_FILTERED', FILTERED_ROW],
  ['LOW_GQ', FILTERED_ROW],
  ['LOW_DP', FILTERED_ROW],
  ['IS_MIXED', ALL_EMPTY],
];

describe('missing-as-no-call scheme', () => {
  it('should define one row per call state', () => {
    expect(missingAsNoCallTable.map(([call]) => call).sort()).toEqual([...CALL_STATES].sort());
  });

  it('should have an entry for every (truth, call) pair', () => {
    for (const truth of TRUTH_STATES) {
      for (const call of CALL_STATES) {
        expect(scheme.lookup(truth, call).length).toBeGreaterThan(0);
      }
    }
    expect(scheme.size).toBe(TRUTH_STATES.length * CALL_STATES.length);
  });

  describe('scenarios', () => {
    it('should score a het call against a hom-ref truth as FP and TN', () => {
      expect(scheme.asSet(scheme.lookup('HOM_REF', 'HET_REF_VAR1'))).toEqual(new Set(['FP', 'TN']));
    });

    it('should score a missing call against a het truth as TN and FN', () => {
      expect(scheme.asSet(scheme.lookup('HET_REF_VAR1', 'MISSING'))).toEqual(new Set(['TN', 'FN']));
    });

    it('should score a matching hom-var call as TP only', () => {
      expect(scheme.asSet(scheme.lookup('HOM_VAR1', 'HOM_VAR1'))).toEqual(new Set(['TP']));
    });

    it('should mark a third-allele het call against a missing truth as NA', () => {
      expect(scheme.lookup('MISSING', 'HET_VAR1_VAR3')).toEqual(['NA']);
    });

    it('should score a no-call as EMPTY for every truth state', () => {
      expect(renderRow('NO_CALL')).toEqual(ALL_EMPTY);
    });

    it('should score a var1/var2 het call against a hom-var truth as TP, FP and FN', () => {
      expect(scheme.asSet(scheme.lookup('HOM_VAR1', 'HET_VAR1_VAR2'))).toEqual(
        new Set(['TP', 'FP', 'FN'])
      );
    });
  });

  describe('missing truth column', () => {
    it('should only score TN for a call that is missing too', () => {
      expect(scheme.render('MISSING', 'MISSING')).toBe('TN');
      expect(scheme.render('MISSING', 'HOM_REF')).toBe('EMPTY');
      expect(scheme.render('MISSING', 'HET_REF_VAR1')).toBe('EMPTY');
      expect(scheme.render('MISSING', 'HOM_VAR1')).toBe('EMPTY');
      expect(scheme.render('MISSING', 'HET_VAR3_VAR4')).toBe('NA');
    });
  });

  describe('rows', () => {
    it.each(EXPECTED_ROWS)('should classify call state %s', (call, expected) => {
      expect(renderRow(call)).toEqual(expected);
    });
  });
});
