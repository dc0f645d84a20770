import { getConfig } from "../config.js";
import { ComputationError, ConfigError, describeError } from "../errors.js";
import { log } from "../utils/logger.js";
import { runJob } from "./run-job.js";
import type { WorkerBackend, WorkerEnvironment, WorkerJob, WorkerOutcome } from "./types.js";

const logger = log.child("pool");

const CLONEABLE_PROTOTYPES = new Set<unknown>([
  Object.prototype,
  Array.prototype,
  Map.prototype,
  Set.prototype,
  Date.prototype,
  RegExp.prototype,
  ArrayBuffer.prototype,
  null,
]);

function isCloneablePrototype(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return CLONEABLE_PROTOTYPES.has(proto) || ArrayBuffer.isView(value) || value instanceof Error;
}

/**
 * Check that an environment can be replicated to workers. Throws ConfigError
 * for values `structuredClone` rejects; returns warnings for class instances,
 * which arrive in workers as plain objects without their methods.
 */
export function checkReplicable(values: Record<string, unknown>): string[] {
  const warnings: string[] = [];
  const seen = new Set<object>();

  function walk(value: unknown, path: string): void {
    if (typeof value !== "object" || value === null || seen.has(value)) return;
    seen.add(value);
    if (!isCloneablePrototype(value)) {
      warnings.push(`${path} is a ${value.constructor?.name ?? "class"} instance; workers receive a plain copy without its prototype`);
      return;
    }
    if (value instanceof Map) {
      for (const [k, v] of value) walk(v, `${path}.get(${String(k)})`);
    } else if (value instanceof Set) {
      for (const v of value) walk(v, `${path}[set]`);
    } else {
      for (const [k, v] of Object.entries(value)) walk(v, `${path}.${k}`);
    }
  }

  for (const [key, value] of Object.entries(values)) {
    try {
      structuredClone(value);
    } catch (err) {
      throw new ConfigError(`Environment value "${key}" cannot be replicated to workers: ${describeError(err)}`, {
        cause: err,
      });
    }
    walk(value, key);
  }
  return warnings;
}

type Worker = {
  index: number;
  env: Record<string, unknown>;
  busy: boolean;
};

export type LocalWorkerPoolOptions = {
  name?: string;
  /** Number of workers (default: `execution.maxConcurrency`). */
  size?: number;
  /**
   * Clone job arguments into the worker and results back out, as a process
   * boundary would (default: true).
   */
  isolate?: boolean;
};

/**
 * In-process pool of logical workers (deployment `local`). Each worker owns a
 * private copy of the environment and runs `setup` on it once; jobs queue
 * while every worker is busy. Workers share the coordinator's event loop:
 * a computation that blocks stalls the whole run and outlives its timeout.
 * Such work belongs on a `ThreadWorkerPool`.
 */
export class LocalWorkerPool implements WorkerBackend {
  readonly name: string;
  readonly type = "local" as const;
  readonly capacity: number;

  private isolate: boolean;
  private workers: Worker[] = [];
  private waiting: Array<(worker: Worker) => void> = [];
  private started = false;

  constructor(opts: LocalWorkerPoolOptions = {}) {
    this.name = opts.name ?? "local";
    this.capacity = opts.size ?? getConfig().execution.maxConcurrency;
    this.isolate = opts.isolate ?? true;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new ConfigError(`Worker pool "${this.name}" needs a positive integer size`);
    }
  }

  async start(env: WorkerEnvironment): Promise<void> {
    if (this.started) await this.stop();
    for (const warning of checkReplicable(env.values)) {
      logger.warn(`Environment replication: ${warning}`, { backend: this.name });
    }

    const workers: Worker[] = [];
    for (let index = 0; index < this.capacity; index++) {
      const copy = structuredClone(env.values);
      await env.setup?.(copy, { backend: this.name, index });
      workers.push({ index, env: copy, busy: false });
    }
    this.workers = workers;
    this.started = true;
    logger.debug("Worker pool started", { backend: this.name, size: this.capacity });
  }

  async execute(job: WorkerJob): Promise<WorkerOutcome> {
    if (!this.started) {
      throw new ConfigError(`Worker pool "${this.name}" has not been started`);
    }
    const worker = await this.acquire();
    const label = `${this.name}#${worker.index}`;
    try {
      let args: unknown[];
      try {
        args = this.isolate ? structuredClone(job.args) : job.args;
      } catch (err) {
        return this.failure(job, label, `arguments cannot be sent to a worker: ${describeError(err)}`, err);
      }

      const outcome = await runJob({ ...job, args }, worker.env, label);
      if (outcome.status !== "ok" || !this.isolate) return outcome;
      try {
        return { ...outcome, value: structuredClone(outcome.value) };
      } catch (err) {
        return this.failure(job, label, `result cannot be returned from a worker: ${describeError(err)}`, err, outcome);
      }
    } finally {
      this.release(worker);
    }
  }

  private failure(
    job: WorkerJob,
    worker: string,
    message: string,
    cause: unknown,
    prior?: WorkerOutcome,
  ): WorkerOutcome {
    return {
      status: "error",
      error: new ComputationError(job.nodeId, `Task "${job.nodeId}": ${message}`, { cause }),
      warnings: prior?.warnings ?? [],
      durationMs: prior?.durationMs ?? 0,
      attempts: prior?.attempts ?? 0,
      worker,
    };
  }

  private acquire(): Promise<Worker> {
    const idle = this.workers.find((w) => !w.busy);
    if (idle) {
      idle.busy = true;
      return Promise.resolve(idle);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(worker: Worker): void {
    const next = this.waiting.shift();
    if (next) {
      next(worker);
    } else {
      worker.busy = false;
    }
  }

  /** Number of jobs waiting for a free worker. */
  get queued(): number {
    return this.waiting.length;
  }

  async stop(): Promise<void> {
    this.started = false;
    this.workers = [];
    logger.debug("Worker pool stopped", { backend: this.name });
  }
}
