/**
 * Typed option records for the simulate / estimate / bootstrap layers.
 *
 * Each layer only ever sees its own record. The bootstrap builds both records
 * once from the caller's options instead of forwarding loose keyword bags.
 */

import os from "os";
import { z, type ZodError } from "zod";
import { OptionsValidationError } from "./relatedness-errors";
import type { ModelParameters } from "@shared/relatedness-types";
import { config } from "./config";

// ============ DEFAULTS ============

export const DEFAULT_EPSILON = 0.001;
/** per-base-pair recombination rate */
export const DEFAULT_RHO = 7.4e-7;
export const DEFAULT_K_INIT = 50;
export const DEFAULT_R_INIT = 0.5;
export const DEFAULT_MAX_ITERATIONS = 500;
/** sqrt(machine epsilon) */
export const DEFAULT_RELATIVE_TOLERANCE = 1.490116e-8;
export const DEFAULT_CONFIDENCE = 95;
export const DEFAULT_NBOOT = 100;
/** cores left free for the rest of the machine */
const RESERVED_CORES = 2;

export function defaultWorkerCount(): number {
  return config.workers ?? Math.max(1, os.cpus().length - RESERVED_CORES);
}

// ============ SCHEMAS ============

const epsilonSchema = z.number().min(0, "epsilon must be >= 0").finite();
const rhoSchema = z.number().positive("rho must be > 0").finite();

export const simulationOptionsSchema = z.object({
  epsilon: epsilonSchema.default(DEFAULT_EPSILON),
  rho: rhoSchema.default(DEFAULT_RHO),
});

export const estimationOptionsSchema = z.object({
  epsilon: epsilonSchema.default(DEFAULT_EPSILON),
  rho: rhoSchema.default(DEFAULT_RHO),
  kInit: z.number().min(0, "kInit must be >= 0").finite().default(DEFAULT_K_INIT),
  rInit: z.number().min(0).max(1, "rInit must be in [0, 1]").default(DEFAULT_R_INIT),
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  relativeTolerance: z.number().positive().default(DEFAULT_RELATIVE_TOLERANCE),
});

export const bootstrapOptionsSchema = z.object({
  confidence: z.number().gt(0).lt(100, "confidence is a percentage in (0, 100)").default(DEFAULT_CONFIDENCE),
  nboot: z.number().int().positive().default(DEFAULT_NBOOT),
  workers: z.number().int().positive().optional(),
  seed: z.number().int().nonnegative().max(0xffffffff).optional(),
  estimation: estimationOptionsSchema.partial().default({}),
  /** overrides applied on top of the estimation epsilon/rho */
  simulation: simulationOptionsSchema.partial().default({}),
});

export type SimulationOptions = z.infer<typeof simulationOptionsSchema>;
export type EstimationOptions = z.infer<typeof estimationOptionsSchema>;
export type BootstrapOptions = z.input<typeof bootstrapOptionsSchema>;

export interface BootstrapPlan {
  confidence: number;
  nboot: number;
  workers: number;
  seed: number | undefined;
  simulation: SimulationOptions;
  estimation: EstimationOptions;
}

// ============ PARSERS ============

function formatZodErrors(error: ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const path = issue.path.join(".") || "root";
    if (!errors[path]) {
      errors[path] = [];
    }
    errors[path].push(issue.message);
  }

  return errors;
}

function parseWith<S extends z.ZodTypeAny>(schema: S, scope: string, input: unknown): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new OptionsValidationError(scope, formatZodErrors(result.error));
  }
  return result.data;
}

export function parseSimulationOptions(input?: Partial<SimulationOptions>): SimulationOptions {
  return parseWith(simulationOptionsSchema, "simulation", input);
}

export function parseEstimationOptions(input?: Partial<EstimationOptions>): EstimationOptions {
  return parseWith(estimationOptionsSchema, "estimation", input);
}

/**
 * Resolve bootstrap options into one plan. Simulation reuses the estimation
 * epsilon and rho unless the caller overrides them explicitly.
 */
export function buildBootstrapPlan(input?: BootstrapOptions): BootstrapPlan {
  const parsed = parseWith(bootstrapOptionsSchema, "bootstrap", input);
  const estimation = parseEstimationOptions(parsed.estimation);
  const simulation = parseSimulationOptions({
    epsilon: parsed.simulation.epsilon ?? estimation.epsilon,
    rho: parsed.simulation.rho ?? estimation.rho,
  });

  return {
    confidence: parsed.confidence,
    nboot: parsed.nboot,
    workers: Math.min(parsed.workers ?? defaultWorkerCount(), parsed.nboot),
    seed: parsed.seed,
    simulation,
    estimation,
  };
}

const modelParametersSchema = z.object({
  k: z.number().min(0, "k must be >= 0").finite(),
  r: z.number().min(0).max(1, "r must be in [0, 1]"),
});

/** Data-generating parameters for simulation and bootstrap */
export function parseModelParameters(input: ModelParameters): ModelParameters {
  return parseWith(modelParametersSchema, "model parameter", input);
}
