import { runJob } from "./run-job.js";
import type { WorkerBackend, WorkerEnvironment, WorkerJob, WorkerOutcome } from "./types.js";

/**
 * Runs jobs one at a time on the coordinator itself, against the
 * coordinator's own environment object. Values are not cloned.
 */
export class MainThreadBackend implements WorkerBackend {
  readonly name: string;
  readonly type = "main" as const;
  readonly capacity = 1;

  private env: Record<string, unknown> = {};
  private tail: Promise<unknown> = Promise.resolve();

  constructor(name = "main") {
    this.name = name;
  }

  async start(env: WorkerEnvironment): Promise<void> {
    this.env = env.values;
    await env.setup?.(this.env, { backend: this.name, index: 0 });
  }

  execute(job: WorkerJob): Promise<WorkerOutcome> {
    // runJob never rejects, so the chain cannot break.
    const run = this.tail.then(() => runJob(job, this.env, `${this.name}#0`));
    this.tail = run;
    return run;
  }

  async stop(): Promise<void> {
    this.env = {};
  }
}
