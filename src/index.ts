// Config
export { getConfig, configure, resetConfig, loadConfigFile, defaults } from "./config.js";
export type { DagcacheConfig, DeepPartial } from "./config.js";

// Errors
export {
  DagcacheError,
  ValidationError,
  ConfigError,
  CyclicDependencyError,
  PatternArityError,
  PatternInputError,
  ComputationError,
  StorageWriteError,
  StorageReadError,
  describeError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, TaskOptionsSchema, FingerprintRecordSchema, ConfigSchema } from "./schemas.js";

// Plan declaration
export { task, plan, ref, literal, map, cross } from "./plan/declare.js";
export type { TaskSpec } from "./plan/declare.js";
export type {
  TaskDefinition,
  TaskOptions,
  TaskContext,
  Computation,
  PlanSource,
  BranchPattern,
  ArgBinding,
  StorageFormat,
  MemoryPolicy,
  CueMode,
} from "./plan/types.js";

// Core
export { Pipeline } from "./pipeline.js";
export type { PipelineOptions, NodeState } from "./pipeline.js";
export type { RunOptions, RunReport, RunStatus, RunCallbacks, NodeReport } from "./executor/types.js";
export { compilePlan, topologicalOrder, ancestorsOf, descendantsOf } from "./graph/builder.js";
export { Graph } from "./graph/types.js";
export type { GraphNode, NodeKind, NodeStatus } from "./graph/types.js";
export type { StaleReason } from "./invalidation/invalidation.js";

// Store
export { FingerprintStore, openStore, openMemoryStore } from "./store/fingerprint-store.js";
export { FileSystemBlobBackend, MemoryBlobBackend } from "./store/backends.js";
export { SqliteMetadataTable } from "./store/metadata.js";
export type { FingerprintRecord, StorageRef, Lookup, BlobBackend, MetadataTable } from "./store/types.js";

// Workers
export { LocalWorkerPool } from "./workers/local-pool.js";
export type { LocalWorkerPoolOptions } from "./workers/local-pool.js";
export { shippableSource, ThreadWorkerPool } from "./workers/thread-pool.js";
export type { ThreadWorkerPoolOptions } from "./workers/thread-pool.js";
export { MainThreadBackend } from "./workers/main-thread.js";
export { BackendRegistry } from "./workers/registry.js";
export type { WorkerBackend, WorkerEnvironment, WorkerJob, WorkerOutcome } from "./workers/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export { Cache } from "./utils/cache.js";
export type { CacheOptions, CacheStats } from "./utils/cache.js";
