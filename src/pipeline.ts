import { describeError } from "./errors.js";
import { expandPattern } from "./graph/branching.js";
import type { PatternInput } from "./graph/branching.js";
import { compilePlan, topologicalOrder } from "./graph/builder.js";
import type { BranchNode, Graph, GraphNode, NodeKind } from "./graph/types.js";
import { inputHashes } from "./executor/inputs.js";
import { Scheduler } from "./executor/scheduler.js";
import type { RunOptions, RunReport } from "./executor/types.js";
import { codeHash, isStale, patternValueHash } from "./invalidation/invalidation.js";
import type { StaleReason } from "./invalidation/invalidation.js";
import type { PlanSource } from "./plan/types.js";
import { openStore } from "./store/fingerprint-store.js";
import type { FingerprintStore } from "./store/fingerprint-store.js";
import type { FingerprintRecord, Lookup } from "./store/types.js";
import { log } from "./utils/logger.js";
import { LocalWorkerPool } from "./workers/local-pool.js";
import { MainThreadBackend } from "./workers/main-thread.js";
import { BackendRegistry } from "./workers/registry.js";
import { ThreadWorkerPool } from "./workers/thread-pool.js";
import type { WorkerBackend, WorkerEnvironment } from "./workers/types.js";

const logger = log.child("pipeline");

export type PipelineOptions = {
  /** An opened store. Takes precedence over `root`. */
  store?: FingerprintStore;
  /** Store directory (default: `store.root` from config). */
  root?: string;
  /** Size of the `worker` and `local` pools (default: `execution.maxConcurrency`). */
  workers?: number;
  /** Extra backends, or replacements for `worker`, `local` and `main`. */
  backends?: WorkerBackend[];
  /** Initialization context replicated to every worker before it runs a node. */
  environment?: WorkerEnvironment;
};

export type NodeState = {
  id: string;
  taskName: string;
  kind: NodeKind;
  state: "stale" | "fresh";
  reason: StaleReason;
};

/**
 * Entry point for callers: runs plans against a store and answers questions
 * about what is stored.
 */
export class Pipeline {
  readonly store: FingerprintStore;
  readonly backends = new BackendRegistry();
  private environment: WorkerEnvironment;

  constructor(opts: PipelineOptions = {}) {
    this.store = opts.store ?? openStore(opts.root);
    this.environment = opts.environment ?? { values: {} };
    this.backends.add(new ThreadWorkerPool({ name: "worker", size: opts.workers }));
    this.backends.add(new LocalWorkerPool({ name: "local", size: opts.workers }));
    this.backends.add(new MainThreadBackend("main"));
    for (const backend of opts.backends ?? []) this.backends.set(backend);
  }

  addBackend(backend: WorkerBackend): void {
    this.backends.add(backend);
  }

  /** Compile a plan into a fresh graph without touching the store. */
  compile(source: PlanSource): Graph {
    return compilePlan(source);
  }

  /** Build every stale node of the plan (or of `targets` and their ancestors). */
  async run(source: PlanSource, opts: RunOptions = {}): Promise<RunReport> {
    const graph = compilePlan(source);
    const scheduler = new Scheduler(graph, { store: this.store, backends: this.backends }, opts);
    const backends = scheduler.requiredBackends();

    for (const backend of backends) await backend.start(this.environment);
    try {
      return await scheduler.run();
    } finally {
      for (const backend of backends) {
        await backend.stop().catch((err: unknown) =>
          logger.warn(`Backend "${backend.name}" did not stop cleanly`, { error: describeError(err) }),
        );
      }
    }
  }

  /**
   * Report which nodes a run would rebuild, without executing anything.
   * Patterns whose inputs are fresh are expanded from stored values; nodes
   * downstream of a stale node are reported stale.
   */
  async getStatus(source: PlanSource): Promise<NodeState[]> {
    const graph = compilePlan(source);
    const states = new Map<string, NodeState>();
    const stale = (id: string) => states.get(id)?.state !== "fresh";
    const put = (node: GraphNode, reason: StaleReason) =>
      states.set(node.id, {
        id: node.id,
        taskName: node.taskName,
        kind: node.kind,
        state: reason === "fresh" ? "fresh" : "stale",
        reason,
      });

    for (const node of topologicalOrder(graph)) {
      if (node.dependsOn.some(stale)) {
        put(node, "upstream-stale");
        continue;
      }
      if (node.kind !== "pattern") {
        put(node, await this.staleness(graph, node));
        continue;
      }

      let branches: BranchNode[];
      try {
        branches = expandPattern(graph, node, await this.storedPatternInputs(graph, node));
      } catch (err) {
        logger.debug(`Cannot expand "${node.id}" from stored values`, { error: describeError(err) });
        put(node, "expansion-failed");
        continue;
      }
      for (const branch of branches) put(branch, await this.staleness(graph, branch));
      if (branches.some((b) => stale(b.id))) {
        put(node, "upstream-stale");
        continue;
      }

      const record = this.store.getMetadata(node.id);
      const pairs = branches.map((b): [string, string] => [b.id, this.store.getMetadata(b.id)?.valueHash ?? ""]);
      if (!record || record.valueHash === null) put(node, "missing");
      else if (record.invalidated) put(node, "invalidated");
      else if (record.codeHash !== codeHash(node.definition)) put(node, "code-changed");
      else if (record.valueHash !== patternValueHash(pairs)) put(node, "inputs-changed");
      else put(node, "fresh");
    }

    return graph.list().flatMap((n) => states.get(n.id) ?? []);
  }

  private async staleness(graph: Graph, node: GraphNode): Promise<StaleReason> {
    try {
      const current = { codeHash: codeHash(node.definition), inputHashes: inputHashes(graph, node, this.store) };
      return (await isStale(node.id, node.definition, current, this.store)).reason;
    } catch (err) {
      logger.debug(`Cannot fingerprint "${node.id}"`, { error: describeError(err) });
      return "missing";
    }
  }

  private async storedPatternInputs(graph: Graph, node: GraphNode): Promise<PatternInput[]> {
    const pattern = node.definition.pattern;
    const inputs: PatternInput[] = [];
    for (const ref of pattern.kind === "none" ? [] : pattern.refs) {
      const upstream = graph.require(ref);
      if (upstream.kind === "pattern") {
        inputs.push({ kind: "branches", ref, branchIds: upstream.branches ?? [] });
        continue;
      }
      const result = await this.store.get(ref);
      if (!result.found) throw new Error(`No stored value for "${ref}"`);
      inputs.push({ kind: "value", ref, value: result.value, format: upstream.definition.options.format });
    }
    return inputs;
  }

  /** Read a stored value. A pattern name yields the ordered values of its branches. */
  readValue(nodeId: string): Promise<Lookup<unknown>> {
    return this.store.get(nodeId);
  }

  readMetadata(nodeId: string): FingerprintRecord | undefined {
    return this.store.getMetadata(nodeId);
  }

  /** Ids a task name or node id stands for: the node itself and, for a task, all of its branches. */
  private resolveIds(target: string): string[] {
    const ids = new Set<string>();
    for (const record of this.store.list()) {
      if (record.nodeId === target || record.taskName === target) ids.add(record.nodeId);
      if (record.nodeId === target) for (const b of record.branches ?? []) ids.add(b);
    }
    return [...ids].sort();
  }

  /** Force the next run to rebuild a node (or every branch of a task). Stored values stay. */
  invalidate(target: string): number {
    return this.store.invalidate(this.resolveIds(target));
  }

  /** Purge stored data for a node, a task with all its branches, or every id matching a RegExp. */
  async delete(target: string | RegExp): Promise<string[]> {
    const ids =
      typeof target === "string"
        ? this.resolveIds(target)
        : this.store
            .list()
            .map((r) => r.nodeId)
            .filter((id) => target.test(id));
    await this.store.delete(ids);
    logger.info("Deleted stored nodes", { count: ids.length });
    return ids;
  }

  /**
   * Delete stored entries the plan no longer reaches: tasks that were removed
   * and branches their pattern no longer produces. A pattern keeps the
   * branches its last consolidation listed plus every branch an expansion of
   * the stored upstream values yields, so work from an unfinished run stays.
   * Orphaned blobs without a record are removed as well.
   */
  async prune(source: PlanSource): Promise<string[]> {
    const graph = compilePlan(source);
    const keep = new Set<string>();
    for (const node of topologicalOrder(graph)) {
      keep.add(node.id);
      if (node.kind !== "pattern") continue;
      for (const branch of this.store.getMetadata(node.id)?.branches ?? []) keep.add(branch);
      try {
        for (const branch of expandPattern(graph, node, await this.storedPatternInputs(graph, node))) {
          keep.add(branch.id);
        }
      } catch (err) {
        logger.debug(`Cannot expand "${node.id}" from stored values`, { error: describeError(err) });
      }
    }

    const records = this.store.list().map((r) => r.nodeId);
    const doomed = records.filter((id) => !keep.has(id));
    await this.store.delete(doomed);

    const known = new Set(records.filter((id) => keep.has(id)));
    const orphans = (await this.store.blobKeys()).filter((key) => !known.has(key) && !doomed.includes(key));
    await this.store.delete(orphans);

    const removed = [...doomed, ...orphans].sort();
    logger.info("Pruned stored nodes", { records: doomed.length, orphans: orphans.length });
    return removed;
  }

  close(): void {
    this.store.close();
  }
}
