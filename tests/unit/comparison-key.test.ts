import { describe, it, expect } from 'vitest';
import { TruthAndCallStates } from '../../src/core/comparison-key.js';

describe('TruthAndCallStates', () => {
  it('should be equal when both components are equal', () => {
    const a = new TruthAndCallStates('HOM_REF', 'HET_REF_VAR1');
    const b = new TruthAndCallStates('HOM_REF', 'HET_REF_VAR1');
    expect(a.equals(b)).toBe(true);
    expect(a.id).toBe(b.id);
  });

  it('should differ when either component differs', () => {
    const base = new TruthAndCallStates('HOM_REF', 'HOM_REF');
    expect(base.equals(new TruthAndCallStates('MISSING', 'HOM_REF'))).toBe(false);
    expect(base.equals(new TruthAndCallStates('HOM_REF', 'MISSING'))).toBe(false);
  });

  it('should not confuse swapped components', () => {
    const a = new TruthAndCallStates('HOM_REF', 'MISSING');
    const b = new TruthAndCallStates('MISSING', 'HOM_REF');
    expect(a.id).not.toBe(b.id);
  });

  it('should build ids matching keyOf', () => {
    const key = new TruthAndCallStates('HET_VAR1_VAR2', 'HET_VAR1_VAR3');
    expect(key.id).toBe('HET_VAR1_VAR2|HET_VAR1_VAR3');
    expect(TruthAndCallStates.keyOf('HET_VAR1_VAR2', 'HET_VAR1_VAR3')).toBe(key.id);
  });

  it('should be frozen', () => {
    const key = new TruthAndCallStates('HOM_REF', 'HOM_REF');
    expect(Object.isFrozen(key)).toBe(true);
  });

  it('should render as a bracketed pair', () => {
    expect(String(new TruthAndCallStates('NO_CALL', 'LOW_DP'))).toBe('[NO_CALL, LOW_DP]');
  });
});
