import { Worker } from "node:worker_threads";
import { getConfig } from "../config.js";
import { ComputationError, ConfigError, describeError } from "../errors.js";
import { ThreadMessageSchema } from "../schemas.js";
import type { ThreadMessage } from "../schemas.js";
import { log } from "../utils/logger.js";
import { checkReplicable } from "./local-pool.js";
import { cancelledError, runAttempts, timeoutError } from "./run-job.js";
import type { WorkerBackend, WorkerEnvironment, WorkerJob, WorkerOutcome } from "./types.js";

const logger = log.child("threads");

// Runs inside each thread. Functions arrive as source text and are rebuilt
// there, so they see only their arguments, the context and globals.
const BOOTSTRAP = `
const { parentPort, workerData } = require("node:worker_threads");

function revive(source) {
  return new Function("return (" + source + ");")();
}

function messageOf(err) {
  return err && typeof err.message === "string" ? err.message : String(err);
}

const env = workerData.values;
const functions = new Map();

Promise.resolve()
  .then(() => (workerData.setup ? revive(workerData.setup)(env, workerData.worker) : undefined))
  .then(
    () => parentPort.postMessage({ type: "ready" }),
    (err) => parentPort.postMessage({ type: "setup-failed", message: messageOf(err) }),
  );

parentPort.on("message", async (job) => {
  const context = {
    nodeId: job.nodeId,
    taskName: job.taskName,
    branchIndex: job.branchIndex,
    env,
    signal: new AbortController().signal,
    warn: (message) => parentPort.postMessage({ type: "warning", job: job.id, message: String(message) }),
  };
  let value;
  try {
    let compute = functions.get(job.source);
    if (!compute) {
      compute = revive(job.source);
      functions.set(job.source, compute);
    }
    value = await compute(job.args, context);
  } catch (err) {
    const name = err && typeof err.name === "string" ? err.name : "Error";
    parentPort.postMessage({ type: "failed", job: job.id, name, message: messageOf(err) });
    return;
  }
  try {
    parentPort.postMessage({ type: "done", job: job.id, value });
  } catch (err) {
    parentPort.postMessage({
      type: "failed",
      job: job.id,
      name: "DataCloneError",
      message: 'Task "' + job.nodeId + '": result cannot be returned from a worker: ' + messageOf(err),
    });
  }
});
`;

const CLOSURE_HINT =
  'worker threads receive only the function source; deploy tasks that use closures or imports to "local" or "main"';

/**
 * Source text of a function that can be rebuilt in another thread, or
 * undefined for native, bound and method-shorthand functions.
 */
export function shippableSource(fn: (...args: never[]) => unknown): string | undefined {
  const source = Function.prototype.toString.call(fn);
  if (source.includes("[native code]")) return undefined;
  if (!/^(async\s*)?(function\b|\(|[A-Za-z_$][\w$]*\s*=>)/.test(source)) return undefined;
  return source;
}

function parseMessage(raw: unknown): ThreadMessage | undefined {
  const parsed = ThreadMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

type Slot = {
  index: number;
  /** Unset after the thread was terminated; the next job starts a fresh one. */
  thread?: Worker;
  busy: boolean;
};

export type ThreadWorkerPoolOptions = {
  name?: string;
  /** Number of threads (default: `execution.maxConcurrency`). */
  size?: number;
};

/**
 * Pool of `worker_threads`. Each thread is started from a clone of the
 * environment values and runs `setup` on it before its first job.
 * Computations and `setup` are shipped as source text. A job that overruns
 * its timeout, or is cancelled, has its thread terminated; the slot gets a
 * fresh thread for the next job.
 */
export class ThreadWorkerPool implements WorkerBackend {
  readonly name: string;
  readonly type = "thread" as const;
  readonly capacity: number;

  private slots: Slot[] = [];
  private waiting: Array<(slot: Slot) => void> = [];
  private values: Record<string, unknown> = {};
  private setupSource?: string;
  private sequence = 0;
  private started = false;

  constructor(opts: ThreadWorkerPoolOptions = {}) {
    this.name = opts.name ?? "worker";
    this.capacity = opts.size ?? getConfig().execution.maxConcurrency;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new ConfigError(`Worker pool "${this.name}" needs a positive integer size`);
    }
  }

  async start(env: WorkerEnvironment): Promise<void> {
    if (this.started) await this.stop();
    for (const warning of checkReplicable(env.values)) {
      logger.warn(`Environment replication: ${warning}`, { backend: this.name });
    }
    this.setupSource = undefined;
    if (env.setup) {
      this.setupSource = shippableSource(env.setup);
      if (!this.setupSource) {
        throw new ConfigError(`Environment setup for "${this.name}" cannot be sent to worker threads (${CLOSURE_HINT})`);
      }
    }
    this.values = env.values;

    const slots: Slot[] = Array.from({ length: this.capacity }, (_, index) => ({ index, busy: false }));
    const spawned = await Promise.allSettled(slots.map((slot) => this.spawn(slot.index)));
    const failure = spawned.find((s): s is PromiseRejectedResult => s.status === "rejected");
    spawned.forEach((s, i) => {
      if (s.status === "fulfilled") slots[i].thread = s.value;
    });
    this.slots = slots;
    if (failure) {
      await this.stop();
      throw failure.reason;
    }
    this.started = true;
    logger.debug("Thread pool started", { backend: this.name, size: this.capacity });
  }

  private spawn(index: number): Promise<Worker> {
    const label = `${this.name}#${index}`;
    const thread = new Worker(BOOTSTRAP, {
      eval: true,
      workerData: { values: this.values, setup: this.setupSource, worker: { backend: this.name, index } },
    });
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        thread.off("message", onMessage);
        thread.off("error", onError);
      };
      const onMessage = (raw: unknown) => {
        const msg = parseMessage(raw);
        if (msg?.type === "ready") {
          cleanup();
          resolve(thread);
        } else if (msg?.type === "setup-failed") {
          cleanup();
          this.terminate(thread, label);
          reject(new ConfigError(`Setup failed on worker "${label}": ${msg.message}`));
        }
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ConfigError(`Worker "${label}" failed to start: ${err.message}`, { cause: err }));
      };
      thread.on("message", onMessage);
      thread.on("error", onError);
    });
  }

  private terminate(thread: Worker, label: string): void {
    thread.terminate().catch((err: unknown) => {
      logger.warn(`Worker "${label}" did not terminate cleanly`, { error: describeError(err) });
    });
  }

  async execute(job: WorkerJob): Promise<WorkerOutcome> {
    if (!this.started) {
      throw new ConfigError(`Worker pool "${this.name}" has not been started`);
    }
    const source = shippableSource(job.compute);
    if (!source) {
      const error = new ComputationError(
        job.nodeId,
        `Task "${job.nodeId}" cannot run on a worker thread: its source is not a standalone function (${CLOSURE_HINT})`,
      );
      return { status: "error", error, warnings: [], durationMs: 0, attempts: 0, worker: this.name };
    }
    const slot = await this.acquire();
    try {
      return await runAttempts(job, `${this.name}#${slot.index}`, (warn) => this.attempt(slot, job, source, warn));
    } finally {
      this.release(slot);
    }
  }

  private async attempt(slot: Slot, job: WorkerJob, source: string, warn: (message: string) => void): Promise<unknown> {
    if (job.signal.aborted) throw cancelledError(job);
    slot.thread ??= await this.spawn(slot.index);
    const thread = slot.thread;
    const label = `${this.name}#${slot.index}`;
    const id = ++this.sequence;

    return new Promise<unknown>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const finish = () => {
        clearTimeout(timer);
        thread.off("message", onMessage);
        thread.off("error", onError);
        thread.off("exit", onExit);
        job.signal.removeEventListener("abort", onAbort);
      };
      const discard = () => {
        if (slot.thread === thread) slot.thread = undefined;
      };
      const kill = (err: ComputationError) => {
        finish();
        discard();
        this.terminate(thread, label);
        reject(err);
      };
      const onMessage = (raw: unknown) => {
        const msg = parseMessage(raw);
        if (!msg || !("job" in msg) || msg.job !== id) return;
        if (msg.type === "warning") {
          warn(msg.message);
          return;
        }
        finish();
        if (msg.type === "done") {
          resolve(msg.value);
        } else if (msg.type === "failed") {
          const message = msg.name === "ReferenceError" ? `${msg.message} (${CLOSURE_HINT})` : msg.message;
          reject(new ComputationError(job.nodeId, message));
        }
      };
      const onError = (err: Error) => {
        finish();
        discard();
        reject(new ComputationError(job.nodeId, `Worker "${label}" crashed: ${err.message}`, { cause: err }));
      };
      const onExit = (code: number) => {
        finish();
        discard();
        reject(new ComputationError(job.nodeId, `Worker "${label}" exited with code ${code}`));
      };
      const onAbort = () => kill(cancelledError(job));

      thread.on("message", onMessage);
      thread.on("error", onError);
      thread.on("exit", onExit);
      job.signal.addEventListener("abort", onAbort, { once: true });
      if (job.timeoutMs > 0) timer = setTimeout(() => kill(timeoutError(job)), job.timeoutMs);

      try {
        thread.postMessage({
          id,
          source,
          args: job.args,
          nodeId: job.nodeId,
          taskName: job.taskName,
          branchIndex: job.branchIndex,
        });
      } catch (err) {
        finish();
        reject(
          new ComputationError(
            job.nodeId,
            `Task "${job.nodeId}": arguments cannot be sent to a worker: ${describeError(err)}`,
            { cause: err },
          ),
        );
      }
    });
  }

  private acquire(): Promise<Slot> {
    const idle = this.slots.find((s) => !s.busy);
    if (idle) {
      idle.busy = true;
      return Promise.resolve(idle);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(slot: Slot): void {
    const next = this.waiting.shift();
    if (next) {
      next(slot);
    } else {
      slot.busy = false;
    }
  }

  /** Number of jobs waiting for a free thread. */
  get queued(): number {
    return this.waiting.length;
  }

  async stop(): Promise<void> {
    this.started = false;
    const threads = this.slots.flatMap((s) => (s.thread ? [s.thread] : []));
    this.slots = [];
    await Promise.all(threads.map((t) => t.terminate()));
    logger.debug("Thread pool stopped", { backend: this.name });
  }
}
