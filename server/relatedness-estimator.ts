/**
 * MAXIMUM-LIKELIHOOD ESTIMATION OF (k, r)
 *
 * Minimises the negative forward log-likelihood with Nelder-Mead, started at
 * (kInit, rInit). No bounds are imposed: infeasible points score -Infinity in
 * the likelihood, which the optimiser treats as a very large objective.
 *
 * Fatal input problems throw; everything else is returned as warnings next to
 * the estimate so callers can tell a clean fit from one with caveats.
 */

import type {
  DistanceVector,
  FrequencyMatrix,
  GenotypeCalls,
  GenotypePair,
  RelatednessEstimate,
  RelatednessWarning,
} from "@shared/relatedness-types";
import { logLikelihood } from "./hmm-likelihood";
import { assertValidDistances, assertValidFrequencies } from "./input-validators";
import { minimizeNelderMead } from "./nelder-mead";
import { DataError, ModelInfeasibleError } from "./relatedness-errors";
import { parseEstimationOptions, type EstimationOptions } from "./relatedness-options";

/** Panel inputs that have already been through validation */
export interface ValidatedPanel {
  fs: FrequencyMatrix;
  ds: DistanceVector;
  /** Kt per marker */
  cardinalities: number[];
}

// ============ GENOTYPE CHECKS ============

/**
 * Rejects missing or malformed calls and narrows the input to a GenotypePair
 */
export function toGenotypePair(Ys: GenotypeCalls, markerCount: number): GenotypePair {
  if (Ys.length !== markerCount) {
    throw new DataError(
      "GENOTYPE_LENGTH_MISMATCH",
      `Genotype calls cover ${Ys.length} markers but the frequency matrix has ${markerCount}.`
    );
  }

  const missing: number[] = [];
  const invalid: number[] = [];
  const pair: GenotypePair = [];

  Ys.forEach((row, t) => {
    if (row.length !== 2) {
      invalid.push(t);
      return;
    }
    const [yi, yj] = row;
    if (yi === null || yi === undefined || yj === null || yj === undefined || Number.isNaN(yi) || Number.isNaN(yj)) {
      missing.push(t);
      return;
    }
    if (!Number.isInteger(yi) || !Number.isInteger(yj) || yi < 0 || yj < 0) {
      invalid.push(t);
      return;
    }
    pair.push([yi, yj]);
  });

  if (missing.length > 0) {
    throw new DataError(
      "GENOTYPE_MISSING",
      `Genotype calls are missing at ${missing.length} marker(s); missing data are not supported.`,
      missing
    );
  }
  if (invalid.length > 0) {
    throw new DataError(
      "GENOTYPE_INVALID",
      `Genotype calls must be two non-negative integer allele indices per marker; ${invalid.length} marker(s) are not.`,
      invalid
    );
  }

  return pair;
}

/**
 * Calls at or beyond Kt have structurally zero frequency. Only genotyping
 * error can produce them, so they are fatal when epsilon = 0.
 */
export function checkCompatibility(
  Ys: Readonly<GenotypePair>,
  cardinalities: ReadonlyArray<number>,
  epsilon: number
): RelatednessWarning[] {
  const incompatible = Ys
    .map(([yi, yj], t) => (yi >= cardinalities[t] || yj >= cardinalities[t] ? t : -1))
    .filter(t => t >= 0);

  if (incompatible.length === 0) return [];
  if (epsilon === 0) {
    throw new ModelInfeasibleError(incompatible);
  }

  return [{
    code: "ALLELE_EXCEEDS_CARDINALITY",
    field: "Ys",
    message: `Observed allele index exceeds the marker cardinality at ${incompatible.length} marker(s); attributed to genotyping error.`,
    markers: incompatible,
  }];
}

// ============ ESTIMATION ============

/**
 * Estimate (k, r) on a panel that has already been validated. The bootstrap
 * calls this once per replicate.
 */
export function estimateFromValidated(
  panel: ValidatedPanel,
  Ys: Readonly<GenotypePair>,
  options: EstimationOptions
): RelatednessEstimate {
  const { fs, ds, cardinalities } = panel;
  const { epsilon, rho, kInit, rInit, maxIterations, relativeTolerance } = options;

  const warnings = checkCompatibility(Ys, cardinalities, epsilon);

  const optimization = minimizeNelderMead(
    ([k, r]) => -logLikelihood(k, r, Ys, fs, ds, epsilon, rho),
    [kInit, rInit],
    { maxIterations, relativeTolerance }
  );
  const [khat, rhat] = optimization.point;

  if (khat === kInit && rhat === rInit) {
    warnings.push({
      code: "OPTIMIZATION_STALLED",
      field: "optimizer",
      message: `Estimates equal the initial values (k = ${kInit}, r = ${rInit}); the data may be uninformative or the optimizer failed to move.`,
    });
  }

  if (optimization.status === "MAX_ITERATIONS") {
    warnings.push({
      code: "OPTIMIZATION_MAX_ITERATIONS",
      field: "optimizer",
      message: `Optimizer stopped after ${optimization.evaluations} evaluations without converging.`,
    });
  } else if (optimization.status === "SHRINK_FAILED") {
    warnings.push({
      code: "OPTIMIZATION_SHRINK_FAILED",
      field: "optimizer",
      message: "Optimizer stopped because the simplex stopped shrinking.",
    });
  }

  return {
    khat,
    rhat,
    warnings,
    evaluations: optimization.evaluations,
    converged: optimization.converged,
  };
}

export function estimateRelatedness(
  fs: FrequencyMatrix,
  ds: DistanceVector,
  Ys: GenotypeCalls,
  options?: Partial<EstimationOptions>
): RelatednessEstimate {
  const resolved = parseEstimationOptions(options);
  const validation = assertValidFrequencies(fs);
  assertValidDistances(ds, fs.length);
  const pair = toGenotypePair(Ys, fs.length);

  const estimate = estimateFromValidated(
    { fs, ds, cardinalities: validation.cardinalities },
    pair,
    resolved
  );

  return { ...estimate, warnings: [...validation.warnings, ...estimate.warnings] };
}
