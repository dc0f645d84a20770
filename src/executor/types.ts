import type { NodeKind, NodeStatus } from "../graph/types.js";

export type NodeReport = {
  id: string;
  taskName: string;
  kind: NodeKind;
  status: NodeStatus;
  durationMs?: number;
  bytes?: number;
  warnings: string[];
  error?: string;
};

export type RunStatus = "completed" | "failed" | "cancelled";

export type RunReport = {
  runId: string;
  status: RunStatus;
  durationMs: number;
  /** Every node the run covered, in graph order. */
  nodes: NodeReport[];
  /** Errored nodes with their last captured message. */
  errors: Array<{ id: string; error: string }>;
  counts: Record<NodeStatus, number>;
};

/** Build status stream for a CLI or reporter. */
export type RunCallbacks = {
  onNodeStart?: (node: NodeReport) => void;
  onNodeEnd?: (node: NodeReport) => void;
  onNodeSkipped?: (node: NodeReport) => void;
  onExpand?: (patternId: string, branchIds: string[]) => void;
  onRunEnd?: (report: RunReport) => void;
};

export type RunOptions = {
  /** Build only these tasks and what they depend on. */
  targets?: string[];
  /** Rebuild these tasks (every branch of a patterned one) even if fresh. */
  force?: string[];
  /** Upper bound on nodes in flight at once (default: `execution.maxConcurrency`). */
  maxConcurrency?: number;
  signal?: AbortSignal;
  callbacks?: RunCallbacks;
};
