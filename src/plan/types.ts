export type StorageFormat = "json" | "v8";

/** Whether a realized value stays in memory after it has been stored. */
export type MemoryPolicy = "retain" | "drop";

/**
 * How eagerly a task is rebuilt. `thorough` compares code and input
 * fingerprints, `always` rebuilds on every run, `never` keeps any successful
 * record no matter what changed.
 */
export type CueMode = "thorough" | "always" | "never";

export type TaskOptions = {
  format: StorageFormat;
  memory: MemoryPolicy;
  /** Name of the worker backend the task runs on (`worker`, `main`, or a registered one). */
  deployment: string;
  retries: number;
  /** 0 disables the timeout. */
  timeoutMs: number;
  cue: CueMode;
  /** Mixed into the code hash. Bump it to rebuild when the function text did not change. */
  version?: string;
  description?: string;
};

export type LiteralBinding = { kind: "literal"; value: unknown };
export type RefBinding = { kind: "ref"; name: string };
export type ArgBinding = LiteralBinding | RefBinding;

export type BranchPattern =
  | { kind: "none" }
  | { kind: "map"; refs: string[] }
  | { kind: "cross"; refs: string[] };

export type PatternKind = Exclude<BranchPattern["kind"], "none">;

export type TaskContext = {
  nodeId: string;
  taskName: string;
  /** Position of the branch in its pattern's expansion set; undefined for static nodes. */
  branchIndex?: number;
  /** The worker's own copy of the initialization environment. */
  env: Readonly<Record<string, unknown>>;
  signal: AbortSignal;
  /** Record a warning on the node's metadata without failing it. */
  warn(message: string): void;
};

export type Computation = (args: unknown[], context: TaskContext) => unknown;

export type TaskDefinition = {
  readonly name: string;
  readonly compute: Computation;
  readonly args: readonly ArgBinding[];
  readonly pattern: BranchPattern;
  readonly options: Readonly<TaskOptions>;
};

/** Declaration-time plan: the ordered task definitions a caller authored. */
export type PlanSource = {
  readonly tasks: readonly TaskDefinition[];
};
