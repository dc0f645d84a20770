import type { PatternKind, TaskDefinition } from "../plan/types.js";
import type { StorageRef } from "../store/types.js";

export type NodeKind = "static" | "pattern" | "branch";

export type NodeStatus = "pending" | "dispatched" | "completed" | "skipped" | "errored";

/** Which upstream element a branch's pattern argument draws from. */
export type BranchSlice = {
  /** The referenced task. */
  ref: string;
  /** Position of the element in the upstream sequence. */
  index: number;
  /**
   * Stable identity of the element: the upstream branch id for a pattern
   * upstream, `<task>@<value hash>` for elements of a static value.
   */
  identity: string;
  /** Node holding the element: the static upstream itself, or the upstream branch. */
  sourceId: string;
};

type NodeBase = {
  id: string;
  taskName: string;
  definition: TaskDefinition;
  /** Ids of nodes whose values this node needs. */
  dependsOn: string[];
  status: NodeStatus;
  fingerprint?: string;
  storageRef?: StorageRef;
  /** Size of the stored value: written this run, or recorded by the build a skip reuses. */
  bytes?: number;
  durationMs?: number;
  warnings: string[];
  error?: string;
};

export type StaticNode = NodeBase & { kind: "static" };

export type PatternNode = NodeBase & {
  kind: "pattern";
  patternKind: PatternKind;
  /** Branch ids in expansion order; undefined until expanded. */
  branches?: string[];
};

export type BranchNode = NodeBase & {
  kind: "branch";
  patternId: string;
  index: number;
  slices: BranchSlice[];
};

export type GraphNode = StaticNode | PatternNode | BranchNode;

export function isTerminalOk(status: NodeStatus): boolean {
  return status === "completed" || status === "skipped";
}

/** Run-time arena of nodes compiled from a PlanSource. */
export class Graph {
  private nodes = new Map<string, GraphNode>();
  private dependents = new Map<string, Set<string>>();

  add(node: GraphNode): void {
    if (this.nodes.has(node.id)) {
      throw new Error(`Node "${node.id}" is already in the graph`);
    }
    this.nodes.set(node.id, node);
    for (const dep of node.dependsOn) this.link(dep, node.id);
  }

  /** Record an extra dependency edge `from -> to`. */
  addEdge(from: string, to: string): void {
    const node = this.require(to);
    if (!node.dependsOn.includes(from)) node.dependsOn.push(from);
    this.link(from, to);
  }

  private link(from: string, to: string): void {
    let set = this.dependents.get(from);
    if (!set) {
      set = new Set();
      this.dependents.set(from, set);
    }
    set.add(to);
  }

  get(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  require(id: string): GraphNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`Unknown node "${id}"`);
    return node;
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  /** Nodes in insertion order: plan order, branches after their expansion. */
  list(): GraphNode[] {
    return [...this.nodes.values()];
  }

  ids(): string[] {
    return [...this.nodes.keys()];
  }

  dependentsOf(id: string): string[] {
    return [...(this.dependents.get(id) ?? [])];
  }

  get size(): number {
    return this.nodes.size;
  }
}
