/**
 * INPUT VALIDATORS TEST SUITE
 *
 * Frequency matrices and distance vectors must be rejected before any
 * likelihood is computed:
 * - Fatal problems BLOCK (fail-closed)
 * - Stages run in order and stop at the first failing one
 * - Recoverable problems come back as warnings
 */

import { describe, it, expect } from 'vitest';
import {
  validateFrequencies,
  assertValidFrequencies,
  assertValidDistances,
  countLeadingAlleles,
} from '../../input-validators';
import { DataError, FrequencyValidationError } from '../../relatedness-errors';

describe('Input Validators', () => {

  describe('validateFrequencies', () => {
    it('should ACCEPT a padded, ordered matrix and report cardinalities', () => {
      const result = validateFrequencies([
        [0.3, 0.7, 0],
        [0.2, 0.3, 0.5],
      ]);

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.cardinalities).toEqual([2, 3]);
      expect(result.nonZeroMask).toEqual([
        [true, true, false],
        [true, true, true],
      ]);
    });

    it('should BLOCK an empty matrix', () => {
      const result = validateFrequencies([]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('FS_EMPTY');
    });

    it('should BLOCK a ragged matrix', () => {
      const result = validateFrequencies([[0.5, 0.5], [1], [0.5, 0.5]]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('FS_RAGGED');
      expect(result.errors[0].markers).toEqual([1]);
    });

    it('should BLOCK frequencies outside [0, 1]', () => {
      const result = validateFrequencies([[0.5, 0.5], [-0.1, 1.1]]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('FS_OUT_OF_RANGE');
      expect(result.errors[0].markers).toEqual([1]);
    });

    it('should BLOCK NaN frequencies', () => {
      const result = validateFrequencies([[Number.NaN, 1]]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('FS_OUT_OF_RANGE');
    });

    it('should check range before ordering', () => {
      const result = validateFrequencies([[-1, 0.5], [0, 1]]);

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe('FS_OUT_OF_RANGE');
    });

    it('should BLOCK a zero frequency preceding a non-zero one', () => {
      const result = validateFrequencies([[0.5, 0.5, 0], [0.5, 0, 0.5]]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('FS_DISORDERED');
      expect(result.errors[0].markers).toEqual([1]);
    });

    it('should BLOCK rows whose sum is far from one', () => {
      const result = validateFrequencies([[0.5, 0.5], [0.5, 0.4]]);

      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('FS_SUM_DEVIATION');
      expect(result.errors[0].markers).toEqual([1]);
    });

    it('should WARN on a small row-sum deviation', () => {
      const result = validateFrequencies([[0.5, 0.499999]]);

      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].code).toBe('FS_SUM_DEVIATION_SMALL');
      expect(result.warnings[0].markers).toEqual([0]);
    });

    it('should respect a custom maxDeviation', () => {
      const result = validateFrequencies([[0.5, 0.4]], { maxDeviation: 0.2 });

      expect(result.valid).toBe(true);
      expect(result.warnings[0].code).toBe('FS_SUM_DEVIATION_SMALL');
    });

    it('should WARN on markers with a single allele', () => {
      const result = validateFrequencies([[0.5, 0.5], [1, 0], [0.25, 0.75]]);

      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].code).toBe('UNINFORMATIVE_MARKER');
      expect(result.warnings[0].markers).toEqual([1]);
      expect(result.cardinalities).toEqual([2, 1, 2]);
    });
  });

  describe('assertValidFrequencies', () => {
    it('should throw FrequencyValidationError carrying every issue', () => {
      try {
        assertValidFrequencies([[0, 1]]);
        expect.fail('expected FrequencyValidationError');
      } catch (error) {
        expect(error).toBeInstanceOf(FrequencyValidationError);
        if (error instanceof FrequencyValidationError) {
          expect(error.code).toBe('FS_DISORDERED');
          expect(error.issues[0].markers).toEqual([0]);
        }
      }
    });

    it('should return the result when valid', () => {
      const result = assertValidFrequencies([[1, 0]]);
      expect(result.cardinalities).toEqual([1]);
    });
  });

  describe('countLeadingAlleles', () => {
    it('should stop at the first structural zero', () => {
      expect(countLeadingAlleles([0.5, 1e-21, 0.5])).toBe(1);
      expect(countLeadingAlleles([0.2, 0.8, 0, 0])).toBe(2);
      expect(countLeadingAlleles([0, 0])).toBe(0);
    });

    it('should honour a custom threshold', () => {
      expect(countLeadingAlleles([0.6, 0.3, 0.1], 0.2)).toBe(2);
    });
  });

  describe('assertValidDistances', () => {
    it('should BLOCK a length mismatch', () => {
      expect(() => assertValidDistances([1, 2], 3)).toThrow(DataError);
    });

    it('should BLOCK NaN and negative gaps with their positions', () => {
      try {
        assertValidDistances([10, Number.NaN, -5, 0], 4);
        expect.fail('expected DataError');
      } catch (error) {
        expect(error).toBeInstanceOf(DataError);
        if (error instanceof DataError) {
          expect(error.code).toBe('DISTANCES_INVALID');
          expect(error.markers).toEqual([1, 2]);
        }
      }
    });

    it('should ACCEPT Infinity and ignore the last entry', () => {
      expect(() => assertValidDistances([Infinity, 5, Number.NaN], 3)).not.toThrow();
    });
  });
});
