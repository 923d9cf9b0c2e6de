/**
 * One parametric-bootstrap replicate: simulate a genotype pair under
 * (khat, rhat), then re-estimate (k, r) from it.
 *
 * Runs identically on the main thread (workers = 1) and inside a pool worker,
 * and reads nothing but its context and its replicate index.
 */

import { z } from "zod";
import type { RelatednessWarningCode } from "@shared/relatedness-types";
import { simulateWithOptions } from "./genotype-simulator";
import { estimateFromValidated } from "./relatedness-estimator";
import { estimationOptionsSchema, simulationOptionsSchema } from "./relatedness-options";
import { createReplicateRandom } from "./seeded-random";

/** Shared, read-only state cloned into every worker */
export const replicateContextSchema = z.object({
  panel: z.object({
    fs: z.array(z.array(z.number())),
    ds: z.array(z.number()),
    cardinalities: z.array(z.number().int()),
  }),
  khat: z.number(),
  rhat: z.number(),
  seed: z.number().int(),
  simulation: simulationOptionsSchema,
  estimation: estimationOptionsSchema,
});

export type ReplicateContext = z.infer<typeof replicateContextSchema>;

export interface ReplicatePayload {
  replicateIndex: number;
}

export interface ReplicateOutcome {
  index: number;
  khat: number;
  rhat: number;
  warningCodes: RelatednessWarningCode[];
}

export function runBootstrapReplicate(context: ReplicateContext, replicateIndex: number): ReplicateOutcome {
  const random = createReplicateRandom(context.seed, replicateIndex);
  const Ys = simulateWithOptions(
    context.panel.fs,
    context.panel.ds,
    context.khat,
    context.rhat,
    context.simulation,
    random
  );
  const estimate = estimateFromValidated(context.panel, Ys, context.estimation);

  return {
    index: replicateIndex,
    khat: estimate.khat,
    rhat: estimate.rhat,
    warningCodes: estimate.warnings.map(w => w.code),
  };
}
