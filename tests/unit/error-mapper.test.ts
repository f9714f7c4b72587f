/**
 * Unit tests for error-mapper utilities
 */

import { describe, it, expect } from 'vitest';
import { getExitCodeForErrorCode, mapError } from '../../src/utils/error-mapper.js';
import {
  ConcordanceError,
  ErrorCodes,
  SchemeValidationError,
  UnreachableComparisonError,
  createRowArityError,
} from '../../src/core/errors.js';

describe('Error Mapper', () => {
  describe('mapError - ConcordanceError', () => {
    it('should map ConcordanceError with all properties', () => {
      const error = new ConcordanceError('Bad input', ErrorCodes.INVALID_PARAMETER, {
        field: 'truthState',
      });

      expect(mapError(error)).toEqual({
        message: 'Bad input',
        code: 'E1004',
        exitCode: 2,
        details: { field: 'truthState' },
      });
    });

    it('should map scheme errors to exit code 3', () => {
      const errors = [
        createRowArityError('MISSING', 11, 3),
        new SchemeValidationError('MISSING', 'HOM_REF'),
        new UnreachableComparisonError('HOM_REF', 'HOM_VAR3'),
      ];

      errors.forEach((error) => {
        const result = mapError(error);
        expect(result.exitCode).toBe(3);
        expect(result.code).toBe(error.code);
      });
    });
  });

  describe('mapError - other values', () => {
    it('should map a plain Error to INTERNAL_ERROR', () => {
      const result = mapError(new Error('boom'));
      expect(result).toEqual({ message: 'boom', code: 'E5001', exitCode: 1 });
    });

    it('should map a thrown string to UNKNOWN_ERROR', () => {
      const result = mapError('weird');
      expect(result).toEqual({ message: 'weird', code: 'E5000', exitCode: 1 });
    });
  });

  describe('getExitCodeForErrorCode', () => {
    it('should map usage and config errors to 2', () => {
      expect(getExitCodeForErrorCode(ErrorCodes.INVALID_PARAMETER)).toBe(2);
      expect(getExitCodeForErrorCode(ErrorCodes.CONFIG_INVALID)).toBe(2);
    });

    it('should default to 1', () => {
      expect(getExitCodeForErrorCode(ErrorCodes.INTERNAL_ERROR)).toBe(1);
      expect(getExitCodeForErrorCode('E9999')).toBe(1);
    });
  });
});
