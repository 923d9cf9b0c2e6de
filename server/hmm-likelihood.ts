/**
 * HMM FORWARD LIKELIHOOD
 *
 * Log-likelihood of a pair of haploid genotype calls under a two-state hidden
 * Markov model of identity by descent (IBD).
 *
 * Latent chain IBD_t in {0, 1}:
 * - initial distribution (1 - r, r)
 * - P(0 -> 1) = r (1 - e), P(1 -> 1) = r + (1 - r) e, e = exp(-k rho d_t)
 *
 * Emissions integrate out the true alleles (G_i, G_j):
 * - IBD_t = 0: G_i, G_j independent draws from f_t
 * - IBD_t = 1: G_i = G_j ~ f_t
 * and each call is miscalled as each of the other Kt - 1 alleles with
 * probability epsilon.
 *
 * The recursion is the standard forward algorithm: predictive -> filtering
 * (Bayes) -> next predictive. Pure and synchronous; infeasible parameters are
 * encoded as -Infinity so a derivative-free optimizer can walk over them.
 */

import type {
  DistanceVector,
  FrequencyMatrix,
  GenotypePair,
  TransitionProbabilities,
} from "@shared/relatedness-types";
import { countLeadingAlleles } from "./input-validators";

/**
 * Transition probabilities into IBD and of staying IBD across the gap after
 * a marker. A non-finite distance (chromosome boundary) decorrelates fully,
 * even when k = 0.
 */
export function transitionProbabilities(
  k: number,
  r: number,
  distance: number,
  rho: number
): TransitionProbabilities {
  const decay = Number.isFinite(distance) ? Math.exp(-k * rho * distance) : 0;
  return {
    enter: r * (1 - decay),
    stay: r + (1 - r) * decay,
  };
}

/** P(observed | true) under the per-alternative-allele error model */
function callProbability(observed: number, truth: number, cardinality: number, epsilon: number): number {
  return observed === truth ? 1 - (cardinality - 1) * epsilon : epsilon;
}

/**
 * Emission likelihoods of one marker's calls given IBD_t = 0 and IBD_t = 1
 */
export function emissionLikelihoods(
  calls: readonly [number, number],
  row: ReadonlyArray<number>,
  epsilon: number
): { notIbd: number; ibd: number } {
  const cardinality = countLeadingAlleles(row);
  const [yi, yj] = calls;

  // The double sum over (g, g') factorises into two single sums.
  let marginalI = 0;
  let marginalJ = 0;
  let ibd = 0;
  for (let g = 0; g < cardinality; g++) {
    const pi = callProbability(yi, g, cardinality, epsilon);
    const pj = callProbability(yj, g, cardinality, epsilon);
    marginalI += row[g] * pi;
    marginalJ += row[g] * pj;
    ibd += row[g] * pi * pj;
  }

  return { notIbd: marginalI * marginalJ, ibd };
}

export function logLikelihood(
  k: number,
  r: number,
  Ys: Readonly<GenotypePair>,
  fs: FrequencyMatrix,
  ds: DistanceVector,
  epsilon: number,
  rho: number
): number {
  // negated comparisons also catch NaN
  if (!(r >= 0 && r <= 1) || !(k >= 0)) {
    return Number.NEGATIVE_INFINITY;
  }

  let predictiveNotIbd = 1 - r;
  let predictiveIbd = r;
  let total = 0;

  for (let t = 0; t < Ys.length; t++) {
    const { notIbd, ibd } = emissionLikelihoods(Ys[t], fs[t], epsilon);

    const filterNotIbd = predictiveNotIbd * notIbd;
    const filterIbd = predictiveIbd * ibd;
    const marginal = filterNotIbd + filterIbd;

    // Only contradictory inputs get here; bail out before normalising by zero.
    if (marginal === 0) {
      return Number.NEGATIVE_INFINITY;
    }
    total += Math.log(marginal);

    if (t < Ys.length - 1) {
      const { enter, stay } = transitionProbabilities(k, r, ds[t], rho);
      predictiveIbd = (filterNotIbd / marginal) * enter + (filterIbd / marginal) * stay;
      predictiveNotIbd = 1 - predictiveIbd;
    }
  }

  return total;
}
