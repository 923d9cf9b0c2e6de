/**
 * Canonical Relatedness Type Definitions
 *
 * Single source of truth for the data shapes passed between the validator,
 * the forward likelihood, the simulator, the estimator and the bootstrap.
 *
 * Type-only module: the server imports it with `import type`, so nothing here
 * exists at run time.
 */

// ============ PANEL INPUTS ============

/**
 * m markers x Kmax alleles. Per row the non-zero frequencies come first and
 * the row is right-padded with zeros, e.g. [0.3, 0.7, 0, 0].
 */
export type FrequencyMatrix = ReadonlyArray<ReadonlyArray<number>>;

/**
 * ds[t] is the distance from marker t to marker t+1. Infinity between
 * chromosomes; the last entry is never read.
 */
export type DistanceVector = ReadonlyArray<number>;

/** Observed allele calls, one row per marker: [sample i, sample j]. */
export type GenotypePair = Array<[number, number]>;

/** Estimator input before missing calls have been ruled out. */
export type GenotypeCalls = ReadonlyArray<ReadonlyArray<number | null | undefined>>;

// ============ MODEL PARAMETERS ============

export interface ModelParameters {
  /** switch rate, >= 0 */
  k: number;
  /** relatedness, in [0, 1] */
  r: number;
}

export interface TransitionProbabilities {
  /** P(IBD at t+1 | not IBD at t) */
  enter: number;
  /** P(IBD at t+1 | IBD at t) */
  stay: number;
}

// ============ WARNINGS ============

export type RelatednessWarningCode =
  | "FS_SUM_DEVIATION_SMALL"
  | "UNINFORMATIVE_MARKER"
  | "ALLELE_EXCEEDS_CARDINALITY"
  | "OPTIMIZATION_STALLED"
  | "OPTIMIZATION_MAX_ITERATIONS"
  | "OPTIMIZATION_SHRINK_FAILED";

export interface RelatednessWarning {
  code: RelatednessWarningCode;
  field: string;
  message: string;
  /** zero-based marker indices the warning refers to */
  markers?: number[];
  /** number of bootstrap replicates that raised it */
  count?: number;
}

// ============ RESULTS ============

export interface RelatednessEstimate {
  khat: number;
  rhat: number;
  warnings: RelatednessWarning[];
  evaluations: number;
  converged: boolean;
}

export type ConfidenceBounds = [lower: number, upper: number];

export interface BootstrapBounds {
  k: ConfidenceBounds;
  r: ConfidenceBounds;
}

export interface BootstrapCIResult {
  bounds: BootstrapBounds;
  /** rows k, r; columns lower, upper */
  matrix: [ConfidenceBounds, ConfidenceBounds];
  confidence: number;
  nboot: number;
  workers: number;
  seed: number;
  warnings: RelatednessWarning[];
  durationMs: number;
}
