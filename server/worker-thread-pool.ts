/**
 * Worker Thread Pool for CPU-Heavy Operations
 *
 * Fixed-size pool of worker_threads sharing one immutable workerData payload
 * (e.g. the validated marker panel), fed from a FIFO queue of small tasks.
 *
 * The executor script is loaded from compiled JavaScript when the pool runs
 * from dist/, and through the tsx CommonJS loader when it runs from source
 * (tests, scripts).
 */

import { Worker } from "worker_threads";
import { createRequire } from "module";
import { WorkerTaskError } from "./relatedness-errors";
import { log, logWarning } from "./logger";

export type TaskType = "BOOTSTRAP_REPLICATE";

export interface WorkerTask<T = unknown> {
  id: string;
  type: TaskType;
  payload: T;
  createdAt: number;
}

export interface WorkerResult<T = unknown> {
  taskId: string;
  success: boolean;
  result?: T;
  error?: string;
  durationMs: number;
  workerId: number;
}

export interface WorkerPoolOptions {
  size: number;
  /** absolute path of the executor module (.js or .ts) */
  executorPath: string;
  /** cloned once into every worker */
  workerData?: unknown;
}

/** Respawns allowed over the pool's lifetime before remaining tasks are failed */
const MAX_RESPAWNS = 3;

interface PooledWorker {
  worker: Worker;
  id: number;
  busy: boolean;
  tasksProcessed: number;
  currentTask?: string;
}

interface PendingTask<P, R> {
  task: WorkerTask<P>;
  resolve: (r: WorkerResult<R>) => void;
  reject: (e: Error) => void;
}

/**
 * Source for an `eval` worker that loads the executor, registering tsx first
 * when the executor is still TypeScript.
 */
function executorSource(executorPath: string): string {
  const target = JSON.stringify(executorPath);
  if (!executorPath.endsWith(".ts")) {
    return `require(${target});`;
  }
  const loader = JSON.stringify(createRequire(__filename).resolve("tsx/cjs"));
  return `require(${loader});\nrequire(${target});`;
}

export class WorkerThreadPool<P = unknown, R = unknown> {
  private workers: PooledWorker[] = [];
  private taskQueue: Map<string, PendingTask<P, R>> = new Map();
  private pendingQueue: WorkerTask<P>[] = [];
  private readonly options: WorkerPoolOptions;
  private taskCounter = 0;
  private respawns = 0;
  private initialized = false;
  private shutdownRequested = false;

  private metrics = {
    tasksQueued: 0,
    tasksCompleted: 0,
    tasksFailed: 0,
    avgDurationMs: 0,
    peakQueueDepth: 0,
    totalDurationMs: 0,
  };

  constructor(options: WorkerPoolOptions) {
    this.options = options;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    log(`Initializing with ${this.options.size} workers...`, "WORKER_POOL");

    for (let i = 0; i < this.options.size; i++) {
      await this.spawnWorker(i);
    }

    this.initialized = true;
  }

  private async spawnWorker(id: number): Promise<PooledWorker> {
    const worker = new Worker(executorSource(this.options.executorPath), {
      eval: true,
      workerData: { workerId: id, shared: this.options.workerData },
    });

    const pooledWorker: PooledWorker = {
      worker,
      id,
      busy: false,
      tasksProcessed: 0,
    };

    worker.on("message", (result: WorkerResult<R>) => {
      this.handleWorkerResult(pooledWorker, result);
    });

    worker.on("error", (error) => {
      logWarning(`Worker ${id} error: ${error.message}`, "WORKER_POOL");
      this.failCurrentTask(pooledWorker, error);
    });

    worker.on("exit", (code) => {
      if (!this.shutdownRequested && code !== 0) {
        const error = new Error(`worker exited with code ${code}`);
        this.failCurrentTask(pooledWorker, error);
        if (this.respawns >= MAX_RESPAWNS) {
          logWarning(`Worker ${id} exited unexpectedly (code=${code}), respawn limit reached`, "WORKER_POOL");
          this.failAllTasks(error);
          return;
        }
        this.respawns++;
        logWarning(`Worker ${id} exited unexpectedly (code=${code}), respawning...`, "WORKER_POOL");
        this.respawnWorker(id).catch((respawnError: Error) => {
          logWarning(`Worker ${id} could not be respawned: ${respawnError.message}`, "WORKER_POOL");
        });
      }
    });

    this.workers.push(pooledWorker);
    return pooledWorker;
  }

  private async respawnWorker(id: number): Promise<void> {
    const index = this.workers.findIndex(w => w.id === id);
    if (index !== -1) {
      this.workers.splice(index, 1);
    }
    const replacement = await this.spawnWorker(id);
    this.processNextPendingTask(replacement);
  }

  async submitTask(task: Omit<WorkerTask<P>, "id" | "createdAt">): Promise<WorkerResult<R>> {
    if (!this.initialized) {
      await this.initialize();
    }

    const fullTask: WorkerTask<P> = {
      ...task,
      id: `task-${++this.taskCounter}`,
      createdAt: Date.now(),
    };

    this.metrics.tasksQueued++;

    return new Promise((resolve, reject) => {
      this.taskQueue.set(fullTask.id, { task: fullTask, resolve, reject });

      const availableWorker = this.workers.find(w => !w.busy);
      if (availableWorker) {
        this.assignTaskToWorker(availableWorker, fullTask);
      } else {
        this.pendingQueue.push(fullTask);
        if (this.pendingQueue.length > this.metrics.peakQueueDepth) {
          this.metrics.peakQueueDepth = this.pendingQueue.length;
        }
      }
    });
  }

  private assignTaskToWorker(worker: PooledWorker, task: WorkerTask<P>): void {
    worker.busy = true;
    worker.currentTask = task.id;
    worker.worker.postMessage(task);
  }

  private handleWorkerResult(worker: PooledWorker, result: WorkerResult<R>): void {
    worker.busy = false;
    worker.tasksProcessed++;
    worker.currentTask = undefined;

    const pending = this.taskQueue.get(result.taskId);
    if (pending) {
      this.taskQueue.delete(result.taskId);

      if (result.success) {
        this.metrics.tasksCompleted++;
      } else {
        this.metrics.tasksFailed++;
      }

      this.metrics.totalDurationMs += result.durationMs;
      this.metrics.avgDurationMs =
        this.metrics.totalDurationMs / (this.metrics.tasksCompleted + this.metrics.tasksFailed);

      pending.resolve(result);
    }

    this.processNextPendingTask(worker);
  }

  private failCurrentTask(worker: PooledWorker, error: Error): void {
    if (worker.currentTask) {
      const pending = this.taskQueue.get(worker.currentTask);
      if (pending) {
        this.taskQueue.delete(worker.currentTask);
        this.metrics.tasksFailed++;
        pending.reject(new WorkerTaskError(worker.currentTask, error.message));
      }
    }
    worker.busy = false;
    worker.currentTask = undefined;
  }

  private failAllTasks(error: Error): void {
    for (const [taskId, pending] of this.taskQueue) {
      pending.reject(new WorkerTaskError(taskId, error.message));
    }
    this.taskQueue.clear();
    this.pendingQueue = [];
  }

  private processNextPendingTask(worker: PooledWorker): void {
    const nextTask = this.pendingQueue.shift();
    if (nextTask && !worker.busy) {
      this.assignTaskToWorker(worker, nextTask);
    } else if (nextTask) {
      this.pendingQueue.unshift(nextTask);
    }
  }

  getMetrics() {
    return {
      ...this.metrics,
      poolSize: this.options.size,
      busyWorkers: this.workers.filter(w => w.busy).length,
      idleWorkers: this.workers.filter(w => !w.busy).length,
      pendingTasks: this.pendingQueue.length,
      activeTaskCount: this.taskQueue.size,
    };
  }

  /**
   * Terminates every worker. Tasks still in flight are rejected so no caller
   * is left waiting on a promise that can never settle.
   */
  async shutdown(): Promise<void> {
    this.shutdownRequested = true;

    await Promise.all(
      this.workers.map(w => w.worker.terminate())
    );

    this.failAllTasks(new Error("worker pool shut down"));
    this.workers = [];
    this.initialized = false;

    log(`Shutdown complete`, "WORKER_POOL");
  }
}
