import { describe, it, expect } from 'vitest';
import {
  TRUTH_STATES,
  CALL_STATES,
  CONTINGENCY_STATES,
  isTruthState,
  isCallState,
  isContingencyState,
  isCountableState,
  parseTruthState,
  parseCallState,
  truthOrdinal,
} from '../../src/core/states.js';
import { ConcordanceError, ErrorCodes } from '../../src/core/errors.js';

describe('genotype state vocabularies', () => {
  it('should list truth states in canonical column order', () => {
    expect(TRUTH_STATES).toEqual([
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
    ]);
  });

  it('should have 17 call states and 6 contingency states', () => {
    expect(CALL_STATES).toHaveLength(17);
    expect(CONTINGENCY_STATES).toEqual(['TP', 'FP', 'TN', 'FN', 'EMPTY', 'NA']);
  });

  it('should make every truth state a call state', () => {
    for (const truth of TRUTH_STATES) {
      expect(isCallState(truth)).toBe(true);
    }
  });

  it('should not make multi-allelic call states truth states', () => {
    const callOnly = CALL_STATES.filter((call) => !isTruthState(call));
    expect(callOnly).toEqual([
      'HET_REF_VAR2',
      'HET_REF_VAR3',
      'HET_VAR1_VAR3',
      'HET_VAR3_VAR4',
      'HOM_VAR2',
      'HOM_VAR3',
    ]);
  });

  it('should have no duplicate names', () => {
    expect(new Set(TRUTH_STATES).size).toBe(TRUTH_STATES.length);
    expect(new Set(CALL_STATES).size).toBe(CALL_STATES.length);
  });

  describe('guards', () => {
    it('should reject non-string and unknown values', () => {
      expect(isTruthState('HET_REF_VAR2')).toBe(false);
      expect(isTruthState(3)).toBe(false);
      expect(isCallState('hom_ref')).toBe(false);
      expect(isContingencyState('TP')).toBe(true);
      expect(isContingencyState('XP')).toBe(false);
    });

    it('should treat only TP, FP, TN and FN as countable', () => {
      expect(CONTINGENCY_STATES.filter(isCountableState)).toEqual(['TP', 'FP', 'TN', 'FN']);
    });
  });

  describe('truthOrdinal', () => {
    it('should return the column index', () => {
      expect(truthOrdinal('MISSING')).toBe(0);
      expect(truthOrdinal('HOM_VAR1')).toBe(4);
      expect(truthOrdinal('IS_MIXED')).toBe(10);
    });
  });

  describe('parsing', () => {
    it('should accept any case and dashes', () => {
      expect(parseTruthState('het-ref-var1')).toBe('HET_REF_VAR1');
      expect(parseTruthState(' Hom_Ref ')).toBe('HOM_REF');
      expect(parseCallState('het-var3-var4')).toBe('HET_VAR3_VAR4');
    });

    it('should reject a call-only state as a truth state', () => {
      expect(() => parseTruthState('HOM_VAR2')).toThrow(ConcordanceError);
    });

    it('should report the field and suggestion on failure', () => {
      try {
        parseCallState('HOM_VAR4');
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConcordanceError);
        if (error instanceof ConcordanceError) {
          expect(error.code).toBe(ErrorCodes.INVALID_PARAMETER);
          expect(error.message).toContain("unknown call state 'HOM_VAR4'");
          expect(error.context?.field).toBe('callState');
        }
      }
    });
  });
});
