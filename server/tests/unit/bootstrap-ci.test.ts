/**
 * BOOTSTRAP CONFIDENCE INTERVAL TEST SUITE
 *
 * Replicates are seeded per index, so the bounds for a given (seed, nboot)
 * must not depend on the number of workers.
 */

import { describe, it, expect } from 'vitest';
import { computeBootstrapBounds, computeBootstrapCI, percentile } from '../../bootstrap-ci';
import { runBootstrapReplicate } from '../../bootstrap-replicate';
import { buildBootstrapPlan } from '../../relatedness-options';
import { estimateRelatedness } from '../../relatedness-estimator';
import { simulateGenotypes } from '../../genotype-simulator';
import { createRandomSource } from '../../seeded-random';
import {
  BootstrapDegenerateError,
  OptionsValidationError,
} from '../../relatedness-errors';

const MARKERS = 30;
const fs = Array.from({ length: MARKERS }, () => [0.25, 0.25, 0.25, 0.25]);
const ds = Array.from({ length: MARKERS }, (_, t) => (t === MARKERS - 1 ? Infinity : 10000));

describe('Bootstrap CI', () => {

  describe('percentile', () => {
    it('should interpolate between order statistics', () => {
      expect(percentile([4, 1, 3, 2], 50)).toBe(2.5);
      expect(percentile([5, 1, 4, 2, 3], 0)).toBe(1);
      expect(percentile([5, 1, 4, 2, 3], 100)).toBe(5);
    });

    it('should not reorder its input', () => {
      const values = [3, 1, 2];
      percentile(values, 50);
      expect(values).toEqual([3, 1, 2]);
    });
  });

  describe('computeBootstrapBounds', () => {
    it('should take the alpha/2 and 1 - alpha/2 quantiles', () => {
      const samples = [
        { khat: 5, rhat: 0.3 },
        { khat: 1, rhat: 0.1 },
        { khat: 4, rhat: 0.5 },
        { khat: 2, rhat: 0.2 },
        { khat: 3, rhat: 0.4 },
      ];

      const bounds = computeBootstrapBounds(samples, 50);

      expect(bounds.k).toEqual([2, 4]);
      expect(bounds.r).toEqual([0.2, 0.4]);
    });

    it('should BLOCK NaN bounds', () => {
      expect(() => computeBootstrapBounds([{ khat: Number.NaN, rhat: 0.5 }], 95))
        .toThrow(BootstrapDegenerateError);
    });
  });

  describe('runBootstrapReplicate', () => {
    it('should depend only on the seed and the replicate index', () => {
      const plan = buildBootstrapPlan({ nboot: 4, workers: 1, seed: 7 });
      const context = {
        panel: { fs, ds, cardinalities: fs.map(() => 4) },
        khat: 5,
        rhat: 0.3,
        seed: 7,
        simulation: plan.simulation,
        estimation: plan.estimation,
      };

      const first = runBootstrapReplicate(context, 2);
      const again = runBootstrapReplicate(context, 2);

      expect(again).toEqual(first);
      expect(first.index).toBe(2);
    });
  });

  describe('computeBootstrapCI', () => {
    it('should return ordered bounds and echo the run settings', async () => {
      const result = await computeBootstrapCI(fs, ds, 5, 0.3, { nboot: 8, workers: 1, seed: 42 });

      expect(result.nboot).toBe(8);
      expect(result.workers).toBe(1);
      expect(result.seed).toBe(42);
      expect(result.confidence).toBe(95);
      expect(result.bounds.k[0]).toBeLessThanOrEqual(result.bounds.k[1]);
      expect(result.bounds.r[0]).toBeLessThanOrEqual(result.bounds.r[1]);
      expect(result.matrix).toEqual([result.bounds.k, result.bounds.r]);
    });

    it('should repeat exactly with the same seed', async () => {
      const first = await computeBootstrapCI(fs, ds, 5, 0.3, { nboot: 6, workers: 1, seed: 123 });
      const second = await computeBootstrapCI(fs, ds, 5, 0.3, { nboot: 6, workers: 1, seed: 123 });

      expect(second.bounds).toEqual(first.bounds);
    });

    it('should report a drawn seed when none is given', async () => {
      const result = await computeBootstrapCI(fs, ds, 5, 0.3, { nboot: 2, workers: 1 });

      expect(Number.isInteger(result.seed)).toBe(true);
      expect(result.seed).toBeGreaterThanOrEqual(0);
    });

    it('should give the same bounds on two workers as on one', async () => {
      const sequential = await computeBootstrapCI(fs, ds, 5, 0.3, { nboot: 6, workers: 1, seed: 2024 });
      const parallel = await computeBootstrapCI(fs, ds, 5, 0.3, { nboot: 6, workers: 2, seed: 2024 });

      expect(parallel.workers).toBe(2);
      expect(parallel.bounds).toEqual(sequential.bounds);
    });

    it('should ignore the distance after the last marker on any worker count', async () => {
      const openEnded = [...ds.slice(0, -1), Number.NaN];

      const sequential = await computeBootstrapCI(fs, openEnded, 5, 0.3, { nboot: 4, workers: 1, seed: 9 });
      const parallel = await computeBootstrapCI(fs, openEnded, 5, 0.3, { nboot: 4, workers: 2, seed: 9 });

      expect(parallel.bounds).toEqual(sequential.bounds);
    });

    it('should cover the true r at close to the nominal rate', async () => {
      const trueR = 0.5;
      const panelFs = Array.from({ length: 40 }, () => [0.25, 0.25, 0.25, 0.25]);
      const panelDs = panelFs.map(() => Infinity);
      const trials = 60;

      let hits = 0;
      for (let trial = 0; trial < trials; trial++) {
        const Ys = simulateGenotypes(panelFs, panelDs, 5, trueR, {}, createRandomSource(1000 + trial));
        const { khat, rhat } = estimateRelatedness(panelFs, panelDs, Ys);
        const ci = await computeBootstrapCI(panelFs, panelDs, khat, rhat, { nboot: 40, workers: 1, seed: trial + 1 });
        if (ci.bounds.r[0] <= trueR && trueR <= ci.bounds.r[1]) hits++;
      }

      // 0.95 less about four binomial standard deviations for 60 trials
      expect(hits / trials).toBeGreaterThanOrEqual(0.8);
    });

    it('should carry panel warnings through', async () => {
      const panelFs = [...fs.slice(1), [1, 0, 0, 0]];

      const result = await computeBootstrapCI(panelFs, ds, 5, 0.3, { nboot: 2, workers: 1, seed: 1 });

      const uninformative = result.warnings.find(w => w.code === 'UNINFORMATIVE_MARKER');
      expect(uninformative?.markers).toEqual([MARKERS - 1]);
    });

    it('should BLOCK an out-of-range confidence level', async () => {
      await expect(computeBootstrapCI(fs, ds, 5, 0.3, { confidence: 120, workers: 1 }))
        .rejects.toBeInstanceOf(OptionsValidationError);
    });

    it('should BLOCK an infeasible point estimate', async () => {
      await expect(computeBootstrapCI(fs, ds, 5, 1.5, { nboot: 2, workers: 1 }))
        .rejects.toBeInstanceOf(OptionsValidationError);
    });
  });
});
