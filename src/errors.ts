export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_TASK"
  | "UNKNOWN_REFERENCE"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_DEPLOYMENT"
  | "CYCLIC_DEPENDENCY"
  | "PATTERN_ARITY"
  | "PATTERN_INPUT"
  | "COMPUTATION_FAILED"
  | "COMPUTATION_TIMEOUT"
  | "COMPUTATION_CANCELLED"
  | "STORAGE_WRITE"
  | "STORAGE_READ"
  | "CONFIG_INVALID";

/** Base class for every error raised by the engine. */
export class DagcacheError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends DagcacheError {}

export class ConfigError extends DagcacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

/** Raised at plan time when task references form a loop. */
export class CyclicDependencyError extends DagcacheError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLIC_DEPENDENCY", `Dependency cycle detected: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

export class PatternArityError extends DagcacheError {
  readonly pattern: string;
  readonly lengths: Record<string, number>;

  constructor(pattern: string, lengths: Record<string, number>) {
    const detail = Object.entries(lengths)
      .map(([name, len]) => `${name}=${len}`)
      .join(", ");
    super("PATTERN_ARITY", `map pattern "${pattern}" needs inputs of equal length (${detail})`);
    this.pattern = pattern;
    this.lengths = lengths;
  }
}

export class PatternInputError extends DagcacheError {
  constructor(pattern: string, input: string, actual: string) {
    super("PATTERN_INPUT", `Pattern "${pattern}" input "${input}" is not a sequence (got ${actual})`);
  }
}

export class ComputationError extends DagcacheError {
  readonly nodeId: string;

  constructor(
    nodeId: string,
    message: string,
    opts?: { cause?: unknown; code?: "COMPUTATION_FAILED" | "COMPUTATION_TIMEOUT" | "COMPUTATION_CANCELLED" },
  ) {
    super(opts?.code ?? "COMPUTATION_FAILED", message, { cause: opts?.cause });
    this.nodeId = nodeId;
  }
}

export class StorageWriteError extends DagcacheError {
  readonly nodeId: string;

  constructor(nodeId: string, cause: unknown) {
    super("STORAGE_WRITE", `Failed to store "${nodeId}": ${describeError(cause)}`, { cause });
    this.nodeId = nodeId;
  }
}

export class StorageReadError extends DagcacheError {
  readonly nodeId: string;

  constructor(nodeId: string, cause: unknown) {
    super("STORAGE_READ", `Failed to read "${nodeId}": ${describeError(cause)}`, { cause });
    this.nodeId = nodeId;
  }
}

/** Message captured in metadata and run reports for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
