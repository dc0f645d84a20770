import type { ComputationError } from "../errors.js";
import type { Computation } from "../plan/types.js";

/**
 * Initialization context every worker starts from. `values` must survive
 * `structuredClone`: each worker receives its own copy, never the
 * coordinator's objects. `setup` runs once per worker, on that copy, before
 * the worker takes its first job.
 */
export type WorkerEnvironment = {
  values: Record<string, unknown>;
  setup?: (env: Record<string, unknown>, worker: { backend: string; index: number }) => void | Promise<void>;
};

export type WorkerJob = {
  nodeId: string;
  taskName: string;
  compute: Computation;
  args: unknown[];
  branchIndex?: number;
  retries: number;
  /** 0 disables the timeout. */
  timeoutMs: number;
  signal: AbortSignal;
};

type OutcomeBase = {
  warnings: string[];
  durationMs: number;
  attempts: number;
  /** `<backend>#<worker index>` */
  worker: string;
};

export type WorkerOutcome =
  | (OutcomeBase & { status: "ok"; value: unknown })
  | (OutcomeBase & { status: "error"; error: ComputationError });

export interface WorkerBackend {
  /** Deployment name tasks select the backend by. */
  readonly name: string;
  readonly type: "local" | "main" | string;
  /** Jobs the backend runs at once. */
  readonly capacity: number;

  start(env: WorkerEnvironment): Promise<void>;
  /** Run one job. Failures come back as an `error` outcome, never as a rejection. */
  execute(job: WorkerJob): Promise<WorkerOutcome>;
  stop(): Promise<void>;
}
