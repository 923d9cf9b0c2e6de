/**
 * Pool executor for bootstrap replicates. Loaded by WorkerThreadPool; never
 * imported by the main thread.
 */

import { parentPort, workerData } from "worker_threads";
import { z } from "zod";
import type { WorkerResult, WorkerTask } from "./worker-thread-pool";
import {
  replicateContextSchema,
  runBootstrapReplicate,
  type ReplicateOutcome,
  type ReplicatePayload,
} from "./bootstrap-replicate";

const workerDataSchema = z.object({
  workerId: z.number().int(),
  shared: replicateContextSchema,
});

const { workerId, shared: context } = workerDataSchema.parse(workerData);

if (!parentPort) {
  throw new Error("bootstrap-worker must be started as a worker thread");
}
const port = parentPort;

port.on("message", (task: WorkerTask<ReplicatePayload>) => {
  const started = Date.now();
  let response: WorkerResult<ReplicateOutcome>;

  try {
    response = {
      taskId: task.id,
      success: true,
      result: runBootstrapReplicate(context, task.payload.replicateIndex),
      durationMs: Date.now() - started,
      workerId,
    };
  } catch (error) {
    response = {
      taskId: task.id,
      success: false,
      error: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
      durationMs: Date.now() - started,
      workerId,
    };
  }

  port.postMessage(response);
});
