/**
 * RELATEDNESS ESTIMATOR TEST SUITE
 *
 * Tests that:
 * - Missing or malformed calls BLOCK estimation
 * - Alleles beyond Kt are fatal only when epsilon = 0
 * - Uninformative data surface as warnings, not silent defaults
 * - Simulated relatedness is recovered
 */

import { describe, it, expect } from 'vitest';
import { estimateRelatedness, toGenotypePair } from '../../relatedness-estimator';
import { simulateGenotypes } from '../../genotype-simulator';
import { createRandomSource } from '../../seeded-random';
import {
  DataError,
  ModelInfeasibleError,
  OptionsValidationError,
} from '../../relatedness-errors';

describe('Relatedness Estimator', () => {

  describe('toGenotypePair', () => {
    it('should BLOCK missing calls and name the markers', () => {
      try {
        toGenotypePair([[0, 1], [null, 0], [1, undefined]], 3);
        expect.fail('expected DataError');
      } catch (error) {
        expect(error).toBeInstanceOf(DataError);
        if (error instanceof DataError) {
          expect(error.code).toBe('GENOTYPE_MISSING');
          expect(error.markers).toEqual([1, 2]);
        }
      }
    });

    it('should BLOCK NaN calls as missing', () => {
      expect(() => toGenotypePair([[Number.NaN, 0]], 1)).toThrow(DataError);
    });

    it('should BLOCK a length mismatch with the panel', () => {
      try {
        toGenotypePair([[0, 0]], 2);
        expect.fail('expected DataError');
      } catch (error) {
        expect(error).toBeInstanceOf(DataError);
        if (error instanceof DataError) {
          expect(error.code).toBe('GENOTYPE_LENGTH_MISMATCH');
        }
      }
    });

    it('should BLOCK calls that are not allele indices', () => {
      try {
        toGenotypePair([[0, 0], [-1, 0], [0.5, 1], [0, 1, 2]], 4);
        expect.fail('expected DataError');
      } catch (error) {
        expect(error).toBeInstanceOf(DataError);
        if (error instanceof DataError) {
          expect(error.code).toBe('GENOTYPE_INVALID');
          expect(error.markers).toEqual([1, 2, 3]);
        }
      }
    });

    it('should pass well-formed calls through', () => {
      expect(toGenotypePair([[0, 1], [2, 2]], 2)).toEqual([[0, 1], [2, 2]]);
    });
  });

  describe('estimateRelatedness', () => {
    const fs = [
      [0.5, 0.5, 0],
      [0.5, 0.5, 0],
    ];
    const ds = [1000, Infinity];

    it('should BLOCK an allele beyond Kt when epsilon = 0', () => {
      try {
        estimateRelatedness(fs, ds, [[2, 0], [0, 0]], { epsilon: 0 });
        expect.fail('expected ModelInfeasibleError');
      } catch (error) {
        expect(error).toBeInstanceOf(ModelInfeasibleError);
        if (error instanceof ModelInfeasibleError) {
          expect(error.markers).toEqual([0]);
        }
      }
    });

    it('should WARN on an allele beyond Kt when epsilon > 0', () => {
      const estimate = estimateRelatedness(fs, ds, [[2, 0], [0, 0]], { epsilon: 0.01 });
      const warning = estimate.warnings.find(w => w.code === 'ALLELE_EXCEEDS_CARDINALITY');

      expect(warning).toBeDefined();
      expect(warning?.markers).toEqual([0]);
    });

    it('should BLOCK invalid options', () => {
      expect(() => estimateRelatedness(fs, ds, [[0, 0], [0, 0]], { rInit: 2 })).toThrow(OptionsValidationError);
    });

    it('should return the initial values with a stall warning on uninformative data', () => {
      const estimate = estimateRelatedness([[1, 0]], [Infinity], [[0, 0]]);

      expect(estimate.khat).toBe(50);
      expect(estimate.rhat).toBe(0.5);
      const codes = estimate.warnings.map(w => w.code);
      expect(codes).toContain('UNINFORMATIVE_MARKER');
      expect(codes).toContain('OPTIMIZATION_STALLED');
    });

    it('should honour custom initial values', () => {
      const estimate = estimateRelatedness([[1, 0]], [Infinity], [[0, 0]], { kInit: 10, rInit: 0.5 });

      expect(estimate.khat).toBe(10);
      expect(estimate.rhat).toBe(0.5);
    });

    it('should recover r from simulated unlinked markers', () => {
      const markers = 400;
      const panelFs = Array.from({ length: markers }, () => [0.25, 0.25, 0.25, 0.25]);
      const panelDs = Array.from({ length: markers }, () => Infinity);

      const errors = [1, 2, 3, 4, 5].map(seed => {
        const Ys = simulateGenotypes(panelFs, panelDs, 10, 0.25, {}, createRandomSource(seed));
        const { rhat } = estimateRelatedness(panelFs, panelDs, Ys);
        return Math.abs(rhat - 0.25);
      });
      errors.sort((a, b) => a - b);

      expect(errors[2]).toBeLessThan(0.1);
    });

    it('should rank a highly related pair above an unrelated one', () => {
      const markers = 200;
      const panelFs = Array.from({ length: markers }, () => [0.4, 0.3, 0.2, 0.1]);
      const panelDs = Array.from({ length: markers }, (_, t) => ((t + 1) % 50 === 0 ? Infinity : 20000));

      const related = simulateGenotypes(panelFs, panelDs, 5, 0.9, {}, createRandomSource(17));
      const unrelated = simulateGenotypes(panelFs, panelDs, 5, 0.05, {}, createRandomSource(18));

      const high = estimateRelatedness(panelFs, panelDs, related);
      const low = estimateRelatedness(panelFs, panelDs, unrelated);

      expect(high.rhat).toBeGreaterThan(low.rhat);
      expect(high.rhat).toBeGreaterThanOrEqual(0);
      expect(high.rhat).toBeLessThanOrEqual(1);
    });
  });
});
