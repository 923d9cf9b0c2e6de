/**
 * GENOTYPE PAIR SIMULATOR
 *
 * Draws allele calls for two haploid genotypes from the same generative model
 * the forward likelihood scores: the IBD chain uses transitionProbabilities()
 * and Kt comes from countLeadingAlleles(), both shared with hmm-likelihood.ts.
 *
 * Output is reproducible only through the injected RandomSource.
 */

import type { DistanceVector, FrequencyMatrix, GenotypePair } from "@shared/relatedness-types";
import { assertValidDistances, assertValidFrequencies, countLeadingAlleles } from "./input-validators";
import { transitionProbabilities } from "./hmm-likelihood";
import { parseModelParameters, parseSimulationOptions, type SimulationOptions } from "./relatedness-options";
import { createRandomSource, type RandomSource } from "./seeded-random";
import { logWarnings } from "./logger";

/** Categorical draw over row[0:cardinality], normalised by the leading sum */
function drawAllele(row: ReadonlyArray<number>, cardinality: number, random: RandomSource): number {
  let total = 0;
  for (let g = 0; g < cardinality; g++) {
    total += row[g];
  }

  const u = random.next() * total;
  let cumulative = 0;
  for (let g = 0; g < cardinality - 1; g++) {
    cumulative += row[g];
    if (u < cumulative) return g;
  }
  return cardinality - 1;
}

/** Miscall with probability (Kt - 1) epsilon, uniformly over the other alleles */
function observeAllele(truth: number, cardinality: number, epsilon: number, random: RandomSource): number {
  if (random.next() < 1 - (cardinality - 1) * epsilon) {
    return truth;
  }
  const other = Math.floor(random.next() * (cardinality - 1));
  return other < truth ? other : other + 1;
}

/**
 * Simulate one genotype pair with the options already resolved. Used by the
 * bootstrap, which parses options once per run.
 */
export function simulateWithOptions(
  fs: FrequencyMatrix,
  ds: DistanceVector,
  k: number,
  r: number,
  options: SimulationOptions,
  random: RandomSource
): GenotypePair {
  const { epsilon, rho } = options;
  const Ys: GenotypePair = [];
  let ibd = false;

  for (let t = 0; t < fs.length; t++) {
    if (t === 0) {
      ibd = random.next() <= r;
    } else {
      const { enter, stay } = transitionProbabilities(k, r, ds[t - 1], rho);
      ibd = random.next() < (ibd ? stay : enter);
    }

    const cardinality = countLeadingAlleles(fs[t]);
    const gi = drawAllele(fs[t], cardinality, random);
    const gj = ibd ? gi : drawAllele(fs[t], cardinality, random);

    Ys.push([
      observeAllele(gi, cardinality, epsilon, random),
      observeAllele(gj, cardinality, epsilon, random),
    ]);
  }

  return Ys;
}

export function simulateGenotypes(
  fs: FrequencyMatrix,
  ds: DistanceVector,
  k: number,
  r: number,
  options?: Partial<SimulationOptions>,
  random: RandomSource = createRandomSource()
): GenotypePair {
  parseModelParameters({ k, r });
  const resolved = parseSimulationOptions(options);
  const { warnings } = assertValidFrequencies(fs);
  assertValidDistances(ds, fs.length);
  logWarnings(warnings, "SIMULATOR");

  return simulateWithOptions(fs, ds, k, r, resolved, random);
}
