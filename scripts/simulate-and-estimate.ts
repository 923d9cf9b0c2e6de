#!/usr/bin/env tsx
/**
 * Simulate -> estimate -> bootstrap on a synthetic marker panel.
 *
 * Usage: npm run demo -- [k] [r] [seed]
 *
 * The panel has 4 chromosomes of 60 markers spaced 20 kb apart, with 2 to 4
 * alleles per marker.
 */

import {
  computeBootstrapCI,
  computeEffectiveCardinalities,
  createRandomSource,
  estimateRelatedness,
  simulateGenotypes,
  type RandomSource,
} from "../server/index";

const CHROMOSOMES = 4;
const MARKERS_PER_CHROMOSOME = 60;
const SPACING_BP = 20_000;

function buildFrequencies(random: RandomSource): number[][] {
  const markerCount = CHROMOSOMES * MARKERS_PER_CHROMOSOME;
  const fs: number[][] = [];

  for (let t = 0; t < markerCount; t++) {
    const cardinality = 2 + Math.floor(random.next() * 3);
    const weights = Array.from({ length: cardinality }, () => 0.2 + random.next());
    const total = weights.reduce((sum, w) => sum + w, 0);
    const row = [0, 0, 0, 0];
    weights.forEach((w, g) => {
      row[g] = w / total;
    });
    fs.push(row);
  }

  return fs;
}

function buildDistances(): number[] {
  const ds: number[] = [];
  for (let c = 0; c < CHROMOSOMES; c++) {
    for (let t = 0; t < MARKERS_PER_CHROMOSOME; t++) {
      ds.push(t === MARKERS_PER_CHROMOSOME - 1 ? Infinity : SPACING_BP);
    }
  }
  return ds;
}

function parseArg(index: number, fallback: number): number {
  const raw = process.argv[index];
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Argument ${index - 1} must be a number, got "${raw}"`);
  }
  return value;
}

async function main(): Promise<void> {
  const k = parseArg(2, 8);
  const r = parseArg(3, 0.25);
  const seed = parseArg(4, 20240601);

  const random = createRandomSource(seed);
  const fs = buildFrequencies(random);
  const ds = buildDistances();

  const effective = computeEffectiveCardinalities(fs).values;
  const meanEffective = effective.reduce((sum, v) => sum + v, 0) / effective.length;
  console.log(`Panel: ${fs.length} markers, mean effective cardinality ${meanEffective.toFixed(2)}`);

  const Ys = simulateGenotypes(fs, ds, k, r, {}, random);
  const estimate = estimateRelatedness(fs, ds, Ys);
  console.log(`True (k, r) = (${k}, ${r})`);
  console.log(`Estimate   = (${estimate.khat.toFixed(3)}, ${estimate.rhat.toFixed(3)}) after ${estimate.evaluations} evaluations`);

  const ci = await computeBootstrapCI(fs, ds, estimate.khat, estimate.rhat, { nboot: 50, seed });
  console.log(`${ci.confidence}% CI for k: [${ci.bounds.k[0].toFixed(3)}, ${ci.bounds.k[1].toFixed(3)}]`);
  console.log(`${ci.confidence}% CI for r: [${ci.bounds.r[0].toFixed(3)}, ${ci.bounds.r[1].toFixed(3)}]`);
  console.log(`${ci.nboot} replicates on ${ci.workers} worker(s) in ${ci.durationMs}ms`);

  for (const warning of [...estimate.warnings, ...ci.warnings]) {
    console.log(`warning ${warning.code}: ${warning.message}`);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
