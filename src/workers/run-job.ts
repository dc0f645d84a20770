import { ComputationError, describeError } from "../errors.js";
import type { TaskContext } from "../plan/types.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { WorkerJob, WorkerOutcome } from "./types.js";

const logger = log.child("worker");

/** One try at a job. Warnings raised by the computation go through `warn`. */
export type Attempt = (warn: (message: string) => void) => Promise<unknown>;

export function cancelledError(job: WorkerJob): ComputationError {
  return new ComputationError(job.nodeId, `Task "${job.nodeId}" was cancelled`, { code: "COMPUTATION_CANCELLED" });
}

export function timeoutError(job: WorkerJob): ComputationError {
  return new ComputationError(job.nodeId, `Task "${job.nodeId}" timed out after ${job.timeoutMs}ms`, {
    code: "COMPUTATION_TIMEOUT",
  });
}

/** Run the computation once on this thread, bounded by the job's timeout and abort signal. */
async function attemptHere(job: WorkerJob, context: TaskContext): Promise<unknown> {
  if (job.signal.aborted) throw cancelledError(job);

  const timers: Array<ReturnType<typeof setTimeout>> = [];
  let onAbort: (() => void) | undefined;
  const guards: Array<Promise<never>> = [
    new Promise<never>((_, reject) => {
      onAbort = () => reject(cancelledError(job));
      job.signal.addEventListener("abort", onAbort, { once: true });
    }),
  ];
  if (job.timeoutMs > 0) {
    guards.push(
      new Promise<never>((_, reject) => {
        timers.push(setTimeout(() => reject(timeoutError(job)), job.timeoutMs));
      }),
    );
  }

  try {
    return await Promise.race([Promise.resolve().then(() => job.compute(job.args, context)), ...guards]);
  } finally {
    for (const t of timers) clearTimeout(t);
    if (onAbort) job.signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Drive a job through its attempts: retries with backoff, stops on abort,
 * collects warnings. Never rejects.
 */
export async function runAttempts(job: WorkerJob, worker: string, attempt: Attempt): Promise<WorkerOutcome> {
  const start = Date.now();
  const warnings: string[] = [];
  let attempts = 0;
  const warn = (message: string) => {
    warnings.push(message);
    logger.warn(`Task "${job.nodeId}" warned`, { message });
  };

  try {
    const value = await withRetry(
      (n) => {
        attempts = n;
        return attempt(warn);
      },
      {
        maxAttempts: job.retries + 1,
        shouldRetry: (err) =>
          !job.signal.aborted && !(err instanceof ComputationError && err.code === "COMPUTATION_CANCELLED"),
        onRetry: (err, n, delayMs) =>
          logger.warn(`Retrying "${job.nodeId}"`, { attempt: n, delayMs, error: describeError(err) }),
      },
    );
    return { status: "ok", value, warnings, durationMs: Date.now() - start, attempts, worker };
  } catch (err) {
    const error =
      err instanceof ComputationError
        ? err
        : new ComputationError(job.nodeId, describeError(err), { cause: err });
    return { status: "error", error, warnings, durationMs: Date.now() - start, attempts, worker };
  }
}

/** Execute a job on the calling thread against a worker's environment. */
export function runJob(job: WorkerJob, env: Readonly<Record<string, unknown>>, worker: string): Promise<WorkerOutcome> {
  return runAttempts(job, worker, (warn) =>
    attemptHere(job, {
      nodeId: job.nodeId,
      taskName: job.taskName,
      branchIndex: job.branchIndex,
      env,
      signal: job.signal,
      warn,
    }),
  );
}
