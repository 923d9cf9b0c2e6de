/**
 * Per-marker panel summaries: cardinality, diversity and effective
 * cardinality. No sample-size bias correction is applied.
 */

import type { FrequencyMatrix, RelatednessWarning } from "@shared/relatedness-types";
import { assertValidFrequencies } from "./input-validators";

export interface MarkerSummary {
  values: number[];
  warnings: RelatednessWarning[];
}

function sumOfSquares(row: ReadonlyArray<number>): number {
  return row.reduce((sum, f) => sum + f * f, 0);
}

/** Kt: alleles with frequency above the structural-zero threshold */
export function computeCardinalities(fs: FrequencyMatrix): MarkerSummary {
  const { cardinalities, warnings } = assertValidFrequencies(fs);
  return { values: cardinalities, warnings };
}

/** h = 1 - sum(f^2) */
export function computeDiversities(fs: FrequencyMatrix): MarkerSummary {
  const { warnings } = assertValidFrequencies(fs);
  return { values: fs.map(row => 1 - sumOfSquares(row)), warnings };
}

/** K' = 1 / sum(f^2) */
export function computeEffectiveCardinalities(fs: FrequencyMatrix): MarkerSummary {
  const { warnings } = assertValidFrequencies(fs);
  return { values: fs.map(row => 1 / sumOfSquares(row)), warnings };
}
