/**
 * Nelder-Mead simplex minimiser (derivative-free).
 *
 * Follows Nash's formulation: the best vertex is only replaced by a strictly
 * better one, a failed contraction shrinks the simplex toward the best vertex,
 * and non-finite objective values are replaced by a large constant so the
 * search can probe infeasible regions without special-casing them.
 */

import { OptimizationError } from "./relatedness-errors";

export type NelderMeadStatus = "CONVERGED" | "MAX_ITERATIONS" | "SHRINK_FAILED";

export interface NelderMeadOptions {
  /** cap on objective evaluations */
  maxIterations: number;
  relativeTolerance: number;
  reflection: number;
  contraction: number;
  expansion: number;
}

export interface NelderMeadResult {
  point: number[];
  value: number;
  evaluations: number;
  converged: boolean;
  status: NelderMeadStatus;
}

const DEFAULT_OPTIONS: NelderMeadOptions = {
  maxIterations: 500,
  relativeTolerance: 1.490116e-8,
  reflection: 1,
  contraction: 0.5,
  expansion: 2,
};

const BIG = 1.0e35;

export function minimizeNelderMead(
  fn: (x: number[]) => number,
  initial: ReadonlyArray<number>,
  options: Partial<NelderMeadOptions> = {}
): NelderMeadResult {
  const { maxIterations, relativeTolerance, reflection, contraction, expansion } = {
    ...DEFAULT_OPTIONS,
    ...options,
  };
  const n = initial.length;

  let evaluations = 0;
  const evaluate = (x: number[]): number => {
    evaluations++;
    const value = fn(x);
    return Number.isFinite(value) ? value : BIG;
  };

  evaluations++;
  const f0 = fn([...initial]);
  if (!Number.isFinite(f0)) {
    throw new OptimizationError("Function cannot be evaluated at initial parameters");
  }
  const tolerance = relativeTolerance * (Math.abs(f0) + relativeTolerance);

  // Initial simplex: one vertex per coordinate, offset by a tenth of the largest |x_i|
  let step = 0;
  for (const x of initial) {
    step = Math.max(step, 0.1 * Math.abs(x));
  }
  if (step === 0) step = 0.1;

  const points: number[][] = [[...initial]];
  const values: number[] = [f0];
  let size = 0;
  for (let i = 0; i < n; i++) {
    const vertex = [...initial];
    let trial = step;
    while (vertex[i] === initial[i]) {
      vertex[i] = initial[i] + trial;
      trial *= 10;
    }
    size += trial;
    points.push(vertex);
    values.push(Number.NaN);
  }

  let oldSize = size;
  let best = 0;
  let recompute = true;
  let status: NelderMeadStatus = "MAX_ITERATIONS";

  while (evaluations <= maxIterations) {
    if (recompute) {
      for (let j = 0; j <= n; j++) {
        if (j !== best) values[j] = evaluate(points[j]);
      }
      recompute = false;
    }

    let low = values[best];
    let high = low;
    let worst = best;
    for (let j = 0; j <= n; j++) {
      if (j === best) continue;
      const f = values[j];
      if (f < low) {
        best = j;
        low = f;
      }
      if (f > high) {
        worst = j;
        high = f;
      }
    }

    if (high <= low + tolerance) {
      status = "CONVERGED";
      break;
    }

    const centroid = new Array<number>(n);
    for (let i = 0; i < n; i++) {
      let sum = -points[worst][i];
      for (let j = 0; j <= n; j++) {
        sum += points[j][i];
      }
      centroid[i] = sum / n;
    }

    const reflected = centroid.map((c, i) => (1 + reflection) * c - reflection * points[worst][i]);
    const fReflected = evaluate(reflected);

    if (fReflected < low) {
      const expanded = reflected.map((x, i) => expansion * x + (1 - expansion) * centroid[i]);
      const fExpanded = evaluate(expanded);
      if (fExpanded < fReflected) {
        points[worst] = expanded;
        values[worst] = fExpanded;
      } else {
        points[worst] = reflected;
        values[worst] = fReflected;
      }
      continue;
    }

    if (fReflected < high) {
      points[worst] = reflected;
      values[worst] = fReflected;
    }

    const contracted = points[worst].map((x, i) => (1 - contraction) * x + contraction * centroid[i]);
    const fContracted = evaluate(contracted);

    if (fContracted < values[worst]) {
      points[worst] = contracted;
      values[worst] = fContracted;
    } else if (fReflected >= high) {
      // Contraction failed: shrink every vertex toward the best one
      recompute = true;
      size = 0;
      const anchor = points[best];
      for (let j = 0; j <= n; j++) {
        if (j === best) continue;
        points[j] = points[j].map((x, i) => contraction * (x - anchor[i]) + anchor[i]);
        size += points[j].reduce((acc, x, i) => acc + Math.abs(x - anchor[i]), 0);
      }
      if (size < oldSize) {
        oldSize = size;
      } else {
        status = "SHRINK_FAILED";
        break;
      }
    }
  }

  return {
    point: [...points[best]],
    value: values[best],
    evaluations,
    converged: status === "CONVERGED",
    status,
  };
}
