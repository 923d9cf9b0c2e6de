/**
 * Fatal error taxonomy for the relatedness engine.
 *
 * Anything recoverable is returned as a RelatednessWarning alongside the
 * result instead; these classes are only thrown when no result can be given.
 */

import type { ValidationIssue } from "./input-validators";

export class RelatednessError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "RelatednessError";
    this.code = code;
  }
}

/**
 * Frequency matrix failed a fatal check (range, ordering or row sum)
 */
export class FrequencyValidationError extends RelatednessError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const first = issues[0];
    super(first?.code ?? "FS_INVALID", first?.message ?? "Invalid frequency matrix.");
    this.name = "FrequencyValidationError";
    this.issues = issues;
  }
}

/**
 * Missing or malformed genotype calls, or inputs whose shapes disagree
 */
export class DataError extends RelatednessError {
  readonly markers: number[];

  constructor(code: string, message: string, markers: number[] = []) {
    super(code, message);
    this.name = "DataError";
    this.markers = markers;
  }
}

/**
 * An allele with structurally zero probability was observed while epsilon = 0
 */
export class ModelInfeasibleError extends RelatednessError {
  readonly markers: number[];

  constructor(markers: number[]) {
    super(
      "ALLELE_EXCEEDS_CARDINALITY",
      `Observed allele index exceeds the marker cardinality at ${markers.length} marker(s) (first: ${markers[0]}) and epsilon = 0 cannot explain it.`
    );
    this.name = "ModelInfeasibleError";
    this.markers = markers;
  }
}

export class OptimizationError extends RelatednessError {
  constructor(message: string) {
    super("OPTIMIZATION_FAILED", message);
    this.name = "OptimizationError";
  }
}

export class BootstrapDegenerateError extends RelatednessError {
  readonly bounds: number[];

  constructor(bounds: number[]) {
    super("BOOTSTRAP_DEGENERATE", `Bootstrap CI contains NaN bounds: [${bounds.join(", ")}]`);
    this.name = "BootstrapDegenerateError";
    this.bounds = bounds;
  }
}

export class OptionsValidationError extends RelatednessError {
  readonly details: Record<string, string[]>;

  constructor(scope: string, details: Record<string, string[]>) {
    const summary = Object.entries(details)
      .map(([field, messages]) => `${field}: ${messages.join("; ")}`)
      .join(", ");
    super("OPTIONS_INVALID", `Invalid ${scope} options: ${summary}`);
    this.name = "OptionsValidationError";
    this.details = details;
  }
}

export class WorkerTaskError extends RelatednessError {
  readonly taskId: string;

  constructor(taskId: string, message: string) {
    super("WORKER_TASK_FAILED", `Task ${taskId} failed: ${message}`);
    this.name = "WorkerTaskError";
    this.taskId = taskId;
  }
}
