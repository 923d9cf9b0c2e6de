/**
 * FAIL-FAST INPUT VALIDATORS
 *
 * Every entry point runs these before any likelihood is computed. Checks are
 * staged: a stage only runs when the previous one passed, because later checks
 * assume earlier invariants (negative frequencies corrupt the ordering test).
 *
 * Pattern: fatal problems reject the matrix, recoverable ones come back as
 * warnings for the caller to display, log or ignore.
 */

import type { DistanceVector, FrequencyMatrix, RelatednessWarning } from "@shared/relatedness-types";
import { DataError, FrequencyValidationError } from "./relatedness-errors";

// ============ CONSTANTS ============

/** Frequencies at or below this are treated as structurally zero */
export const NON_ZERO_THRESHOLD = 1e-20;

/** Row sums further than this from one are fatal */
export const MAX_SUM_DEVIATION = 1e-5;

// ============ VALIDATION RESULT TYPES ============

export type ValidationIssueCode =
  | "FS_EMPTY"
  | "FS_RAGGED"
  | "FS_OUT_OF_RANGE"
  | "FS_DISORDERED"
  | "FS_SUM_DEVIATION";

export interface ValidationIssue {
  code: ValidationIssueCode;
  field: string;
  message: string;
  markers: number[];
}

export interface FrequencyValidationOptions {
  maxDeviation?: number;
  nonZeroThreshold?: number;
}

export interface FrequencyValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: RelatednessWarning[];
  /** nonZeroMask[t][g] is true when fs[t][g] > nonZeroThreshold */
  nonZeroMask: boolean[][];
  /** leading non-zero allele count per marker (Kt) */
  cardinalities: number[];
}

// ============ CARDINALITY ============

/**
 * Kt: count leading entries above the threshold, stopping at the first one
 * that is not. Shared by the forward likelihood and the simulator.
 */
export function countLeadingAlleles(
  row: ReadonlyArray<number>,
  threshold: number = NON_ZERO_THRESHOLD
): number {
  let count = 0;
  while (count < row.length && row[count] > threshold) {
    count++;
  }
  return count;
}

// ============ STAGES ============

function checkShape(fs: FrequencyMatrix): ValidationIssue[] {
  if (fs.length === 0 || fs[0].length === 0) {
    return [{
      code: "FS_EMPTY",
      field: "fs",
      message: "Frequency matrix must have at least one marker and one allele column.",
      markers: [],
    }];
  }

  const width = fs[0].length;
  const ragged = fs.map((row, t) => (row.length === width ? -1 : t)).filter(t => t >= 0);
  if (ragged.length > 0) {
    return [{
      code: "FS_RAGGED",
      field: "fs",
      message: `Frequency matrix rows must all have ${width} columns; ${ragged.length} marker(s) differ.`,
      markers: ragged,
    }];
  }

  return [];
}

function checkRange(fs: FrequencyMatrix): ValidationIssue[] {
  // NaN fails both comparisons, so it is rejected here too
  const outOfRange = fs
    .map((row, t) => (row.every(f => f >= 0 && f <= 1) ? -1 : t))
    .filter(t => t >= 0);

  if (outOfRange.length === 0) return [];
  return [{
    code: "FS_OUT_OF_RANGE",
    field: "fs",
    message: "Some frequencies are not in [0,1].",
    markers: outOfRange,
  }];
}

function checkOrdering(mask: boolean[][]): ValidationIssue[] {
  const disordered = mask
    .map((row, t) => (row.every((nonZero, g) => g === 0 || !nonZero || row[g - 1]) ? -1 : t))
    .filter(t => t >= 0);

  if (disordered.length === 0) return [];
  return [{
    code: "FS_DISORDERED",
    field: "fs",
    message: "Disordered fs. Per row, all non-zero frequencies should precede all zero frequencies.",
    markers: disordered,
  }];
}

function checkRowSums(
  fs: FrequencyMatrix,
  maxDeviation: number,
  nonZeroThreshold: number
): { errors: ValidationIssue[]; warnings: RelatednessWarning[] } {
  const deviations = fs.map(row => Math.abs(row.reduce((sum, f) => sum + f, 0) - 1));
  const maxDev = deviations.reduce((max, d) => (d > max ? d : max), 0);

  if (maxDev > maxDeviation) {
    return {
      errors: [{
        code: "FS_SUM_DEVIATION",
        field: "fs",
        message: `Some markers have frequencies whose sum deviates from one by up to ${maxDev}.`,
        markers: deviations.map((d, t) => (d > maxDeviation ? t : -1)).filter(t => t >= 0),
      }],
      warnings: [],
    };
  }

  if (maxDev > nonZeroThreshold) {
    return {
      errors: [],
      warnings: [{
        code: "FS_SUM_DEVIATION_SMALL",
        field: "fs",
        message: `Some markers have frequencies whose sum deviates from one by up to ${maxDev}.`,
        markers: deviations.map((d, t) => (d > nonZeroThreshold ? t : -1)).filter(t => t >= 0),
      }],
    };
  }

  return { errors: [], warnings: [] };
}

function checkInformative(mask: boolean[][]): RelatednessWarning[] {
  const uninformative = mask
    .map((row, t) => (row.filter(Boolean).length === 1 ? t : -1))
    .filter(t => t >= 0);

  if (uninformative.length === 0) return [];
  return [{
    code: "UNINFORMATIVE_MARKER",
    field: "fs",
    message: `Some markers are uninformative (have allele frequencies equal to one): ${uninformative.length} marker(s).`,
    markers: uninformative,
  }];
}

// ============ ENTRY POINTS ============

/**
 * Staged validation of a frequency matrix. Stops at the first stage that
 * reports errors; warnings are only collected once every fatal stage passed.
 */
export function validateFrequencies(
  fs: FrequencyMatrix,
  options: FrequencyValidationOptions = {}
): FrequencyValidationResult {
  const { maxDeviation = MAX_SUM_DEVIATION, nonZeroThreshold = NON_ZERO_THRESHOLD } = options;

  const fail = (errors: ValidationIssue[], nonZeroMask: boolean[][] = []): FrequencyValidationResult => ({
    valid: false,
    errors,
    warnings: [],
    nonZeroMask,
    cardinalities: [],
  });

  const shapeErrors = checkShape(fs);
  if (shapeErrors.length > 0) return fail(shapeErrors);

  const rangeErrors = checkRange(fs);
  if (rangeErrors.length > 0) return fail(rangeErrors);

  const nonZeroMask = fs.map(row => row.map(f => f > nonZeroThreshold));

  const orderingErrors = checkOrdering(nonZeroMask);
  if (orderingErrors.length > 0) return fail(orderingErrors, nonZeroMask);

  const sums = checkRowSums(fs, maxDeviation, nonZeroThreshold);
  if (sums.errors.length > 0) return fail(sums.errors, nonZeroMask);

  return {
    valid: true,
    errors: [],
    warnings: [...sums.warnings, ...checkInformative(nonZeroMask)],
    nonZeroMask,
    // ordering holds, so the mask's true count is the leading count
    cardinalities: nonZeroMask.map(row => row.filter(Boolean).length),
  };
}

/**
 * FAIL-CLOSED: throws FrequencyValidationError instead of returning an
 * invalid result.
 */
export function assertValidFrequencies(
  fs: FrequencyMatrix,
  options: FrequencyValidationOptions = {}
): FrequencyValidationResult {
  const result = validateFrequencies(fs, options);
  if (!result.valid) {
    throw new FrequencyValidationError(result.errors);
  }
  return result;
}

/**
 * Distances must line up with the markers. Infinity is allowed (chromosome
 * boundary); NaN and negative gaps are not. The last entry is never read.
 */
export function assertValidDistances(ds: DistanceVector, markerCount: number): void {
  if (ds.length !== markerCount) {
    throw new DataError(
      "DISTANCES_LENGTH_MISMATCH",
      `Distance vector has ${ds.length} entries but the frequency matrix has ${markerCount} markers.`
    );
  }

  const invalid = ds
    .slice(0, -1)
    .map((d, t) => (d >= 0 ? -1 : t))
    .filter(t => t >= 0);
  if (invalid.length > 0) {
    throw new DataError(
      "DISTANCES_INVALID",
      `Inter-marker distances must be non-negative numbers or Infinity; ${invalid.length} entries are not.`,
      invalid
    );
  }
}
