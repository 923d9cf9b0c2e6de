export type {
  BootstrapBounds,
  BootstrapCIResult,
  ConfidenceBounds,
  DistanceVector,
  FrequencyMatrix,
  GenotypeCalls,
  GenotypePair,
  ModelParameters,
  RelatednessEstimate,
  RelatednessWarning,
  RelatednessWarningCode,
  TransitionProbabilities,
} from "@shared/relatedness-types";

export {
  validateFrequencies,
  assertValidFrequencies,
  assertValidDistances,
  countLeadingAlleles,
  NON_ZERO_THRESHOLD,
  MAX_SUM_DEVIATION,
  type FrequencyValidationOptions,
  type FrequencyValidationResult,
  type ValidationIssue,
  type ValidationIssueCode,
} from "./input-validators";
export { logLikelihood, transitionProbabilities, emissionLikelihoods } from "./hmm-likelihood";
export { simulateGenotypes } from "./genotype-simulator";
export { estimateRelatedness, toGenotypePair } from "./relatedness-estimator";
export { computeBootstrapCI, computeBootstrapBounds, percentile } from "./bootstrap-ci";
export {
  computeCardinalities,
  computeDiversities,
  computeEffectiveCardinalities,
  type MarkerSummary,
} from "./marker-summaries";
export { minimizeNelderMead, type NelderMeadOptions, type NelderMeadResult } from "./nelder-mead";
export { createRandomSource, type RandomSource } from "./seeded-random";
export {
  DEFAULT_EPSILON,
  DEFAULT_RHO,
  DEFAULT_K_INIT,
  DEFAULT_R_INIT,
  DEFAULT_CONFIDENCE,
  DEFAULT_NBOOT,
  type SimulationOptions,
  type EstimationOptions,
  type BootstrapOptions,
} from "./relatedness-options";
export {
  RelatednessError,
  FrequencyValidationError,
  DataError,
  ModelInfeasibleError,
  OptimizationError,
  BootstrapDegenerateError,
  OptionsValidationError,
  WorkerTaskError,
} from "./relatedness-errors";
