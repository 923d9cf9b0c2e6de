/**
 * PARAMETRIC BOOTSTRAP CONFIDENCE INTERVALS FOR (k, r)
 *
 * nboot independent replicates of simulate(khat, rhat) -> estimate, reduced to
 * empirical quantiles at alpha/2 and 1 - alpha/2.
 *
 * Reproducibility: replicate i always draws from a stream seeded by
 * (seed, i), and outcomes are ordered by replicate index before reduction, so
 * the bounds depend on (seed, nboot) but never on the worker count.
 */

import path from "path";
import type {
  BootstrapBounds,
  BootstrapCIResult,
  DistanceVector,
  FrequencyMatrix,
  RelatednessWarning,
  RelatednessWarningCode,
} from "@shared/relatedness-types";
import { assertValidDistances, assertValidFrequencies } from "./input-validators";
import {
  runBootstrapReplicate,
  type ReplicateContext,
  type ReplicateOutcome,
  type ReplicatePayload,
} from "./bootstrap-replicate";
import { BootstrapDegenerateError, WorkerTaskError } from "./relatedness-errors";
import { buildBootstrapPlan, parseModelParameters, type BootstrapOptions } from "./relatedness-options";
import { drawMasterSeed } from "./seeded-random";
import { WorkerThreadPool } from "./worker-thread-pool";
import { log, logWarnings } from "./logger";

const BOOTSTRAP_WORKER_PATH = path.resolve(__dirname, `bootstrap-worker${path.extname(__filename)}`);

// ============ QUANTILES ============

/**
 * Linear interpolation between order statistics; p is a percentage.
 */
export function percentile(arr: number[], p: number): number {
  const sorted = [...arr].sort((a, b) => a - b);
  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  if (lower === upper) return sorted[lower];

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (index - lower);
}

export function computeBootstrapBounds(
  samples: ReadonlyArray<{ khat: number; rhat: number }>,
  confidence: number
): BootstrapBounds {
  const alpha = 1 - confidence / 100;
  const lowerP = alpha * 100 / 2;
  const upperP = 100 - alpha * 100 / 2;

  const ks = samples.map(s => s.khat);
  const rs = samples.map(s => s.rhat);
  const bounds: BootstrapBounds = {
    k: [percentile(ks, lowerP), percentile(ks, upperP)],
    r: [percentile(rs, lowerP), percentile(rs, upperP)],
  };

  const flat = [...bounds.k, ...bounds.r];
  if (flat.some(b => Number.isNaN(b))) {
    throw new BootstrapDegenerateError(flat);
  }
  return bounds;
}

// ============ REPLICATE EXECUTION ============

async function runSequential(context: ReplicateContext, nboot: number): Promise<ReplicateOutcome[]> {
  const outcomes: ReplicateOutcome[] = [];
  for (let i = 0; i < nboot; i++) {
    outcomes.push(runBootstrapReplicate(context, i));
  }
  return outcomes;
}

async function runParallel(context: ReplicateContext, nboot: number, workers: number): Promise<ReplicateOutcome[]> {
  const pool = new WorkerThreadPool<ReplicatePayload, ReplicateOutcome>({
    size: workers,
    executorPath: BOOTSTRAP_WORKER_PATH,
    workerData: context,
  });

  try {
    await pool.initialize();
    const results = await Promise.all(
      Array.from({ length: nboot }, (_, replicateIndex) =>
        pool.submitTask({ type: "BOOTSTRAP_REPLICATE", payload: { replicateIndex } })
      )
    );

    const metrics = pool.getMetrics();
    log(
      `${metrics.tasksCompleted} replicates, avg ${metrics.avgDurationMs.toFixed(1)}ms, peak queue ${metrics.peakQueueDepth}`,
      "BOOTSTRAP"
    );

    return results.map(result => {
      if (!result.success || !result.result) {
        throw new WorkerTaskError(result.taskId, result.error ?? "no result returned");
      }
      return result.result;
    });
  } finally {
    await pool.shutdown();
  }
}

function aggregateReplicateWarnings(outcomes: ReplicateOutcome[]): RelatednessWarning[] {
  const counts = new Map<RelatednessWarningCode, number>();
  for (const outcome of outcomes) {
    for (const code of new Set(outcome.warningCodes)) {
      counts.set(code, (counts.get(code) ?? 0) + 1);
    }
  }

  return [...counts.entries()].map(([code, count]) => ({
    code,
    field: "bootstrap",
    message: `${code} raised in ${count} of ${outcomes.length} bootstrap replicates.`,
    count,
  }));
}

// ============ ENTRY POINT ============

export async function computeBootstrapCI(
  fs: FrequencyMatrix,
  ds: DistanceVector,
  khat: number,
  rhat: number,
  options?: BootstrapOptions
): Promise<BootstrapCIResult> {
  const plan = buildBootstrapPlan(options);
  parseModelParameters({ k: khat, r: rhat });
  const validation = assertValidFrequencies(fs);
  assertValidDistances(ds, fs.length);

  const seed = plan.seed ?? drawMasterSeed();
  const context: ReplicateContext = {
    panel: {
      fs: fs.map(row => [...row]),
      // the distance after the last marker is never read
      ds: ds.map((d, t) => (t === ds.length - 1 ? Infinity : d)),
      cardinalities: validation.cardinalities,
    },
    khat,
    rhat,
    seed,
    simulation: plan.simulation,
    estimation: plan.estimation,
  };

  const started = Date.now();
  log(`Running ${plan.nboot} replicates on ${plan.workers} worker(s), seed=${seed}`, "BOOTSTRAP");

  const outcomes = plan.workers === 1
    ? await runSequential(context, plan.nboot)
    : await runParallel(context, plan.nboot, plan.workers);
  outcomes.sort((a, b) => a.index - b.index);

  const bounds = computeBootstrapBounds(outcomes, plan.confidence);
  const warnings = [...validation.warnings, ...aggregateReplicateWarnings(outcomes)];
  logWarnings(warnings, "BOOTSTRAP");

  return {
    bounds,
    matrix: [bounds.k, bounds.r],
    confidence: plan.confidence,
    nboot: plan.nboot,
    workers: plan.workers,
    seed,
    warnings,
    durationMs: Date.now() - started,
  };
}
