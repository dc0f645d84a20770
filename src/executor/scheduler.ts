import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { describeError, StorageReadError, ValidationError } from "../errors.js";
import { expandPattern } from "../graph/branching.js";
import type { PatternInput } from "../graph/branching.js";
import { ancestorsOf, readyNodes } from "../graph/builder.js";
import type { BranchNode, Graph, GraphNode, NodeStatus, PatternNode, StaticNode } from "../graph/types.js";
import { codeHash, isStale, nodeFingerprint, patternValueHash } from "../invalidation/invalidation.js";
import type { CurrentFingerprint, Staleness } from "../invalidation/invalidation.js";
import type { FingerprintStore } from "../store/fingerprint-store.js";
import { log } from "../utils/logger.js";
import type { BackendRegistry } from "../workers/registry.js";
import type { WorkerBackend } from "../workers/types.js";
import { inputHashes, resolveArgs } from "./inputs.js";
import type { NodeReport, RunCallbacks, RunOptions, RunReport } from "./types.js";

const logger = log.child("scheduler");

export type SchedulerDeps = {
  store: FingerprintStore;
  backends: BackendRegistry;
};

export function toNodeReport(node: GraphNode): NodeReport {
  return {
    id: node.id,
    taskName: node.taskName,
    kind: node.kind,
    status: node.status,
    durationMs: node.durationMs,
    bytes: node.bytes,
    warnings: [...node.warnings],
    error: node.error,
  };
}

/**
 * Drives one run of a compiled graph: expands patterns as their inputs
 * settle, skips fresh nodes, dispatches stale ones to worker backends and
 * records every outcome before dependents may start. A failed node leaves its
 * descendants pending while unrelated nodes keep building.
 */
export class Scheduler {
  private graph: Graph;
  private store: FingerprintStore;
  private backends: BackendRegistry;
  private callbacks: RunCallbacks;
  private signal: AbortSignal;
  private limit: number;
  private selection?: Set<string>;
  private forced: Set<string>;
  private codeHashes = new Map<string, string>();
  private inflight = new Map<string, Promise<void>>();

  constructor(graph: Graph, deps: SchedulerDeps, opts: RunOptions = {}) {
    this.graph = graph;
    this.store = deps.store;
    this.backends = deps.backends;
    this.callbacks = opts.callbacks ?? {};
    this.signal = opts.signal ?? new AbortController().signal;
    this.limit = opts.maxConcurrency ?? getConfig().execution.maxConcurrency;
    if (!Number.isInteger(this.limit) || this.limit < 1) {
      throw new ValidationError("VALIDATION_FAILED", "maxConcurrency must be a positive integer");
    }

    const taskNames = new Set(graph.list().map((n) => n.taskName));
    for (const name of [...(opts.targets ?? []), ...(opts.force ?? [])]) {
      if (!taskNames.has(name)) {
        throw new ValidationError("UNKNOWN_REFERENCE", `Unknown task "${name}"`);
      }
    }
    this.forced = new Set(opts.force ?? []);
    if (opts.targets && opts.targets.length > 0) {
      this.selection = ancestorsOf(graph, opts.targets);
    }

    // Unknown deployments fail here, before any work runs.
    this.requiredBackends();
  }

  /** Backends the selected nodes deploy to. */
  requiredBackends(): WorkerBackend[] {
    const names = new Set(this.nodesInScope().map((n) => n.definition.options.deployment));
    return [...names].map((name) => this.backends.require(name));
  }

  private nodesInScope(): GraphNode[] {
    const selection = this.selection;
    return this.graph.list().filter((n) => !selection || selection.has(n.id));
  }

  async run(): Promise<RunReport> {
    const runId = randomUUID();
    const start = Date.now();
    let cancelled = false;
    logger.info("Run started", { runId, nodes: this.nodesInScope().length, maxConcurrency: this.limit });

    for (;;) {
      if (this.signal.aborted) {
        cancelled = true;
        break;
      }
      const progressed = await this.step();
      if (this.inflight.size === 0) {
        if (!progressed) break;
        continue;
      }
      if (!progressed || this.inflight.size >= this.limit) {
        await Promise.race(this.inflight.values());
      }
    }

    if (this.inflight.size > 0) {
      logger.info("Waiting for in-flight nodes", { count: this.inflight.size });
      await Promise.allSettled([...this.inflight.values()]);
    }

    const report = this.report(runId, start, cancelled);
    logger.info("Run finished", { runId, status: report.status, ...report.counts, durationMs: report.durationMs });
    this.notify(this.callbacks.onRunEnd, report);
    return report;
  }

  /** Advance every ready node once. Returns whether anything changed. */
  private async step(): Promise<boolean> {
    let progressed = false;
    for (const node of readyNodes(this.graph, this.selection)) {
      if (this.signal.aborted) break;
      if (await this.advance(node)) progressed = true;
    }
    return progressed;
  }

  private advance(node: GraphNode): Promise<boolean> {
    switch (node.kind) {
      case "pattern":
        return node.branches ? this.consolidate(node) : this.expand(node);
      case "static":
      case "branch":
        return this.gate(node);
    }
  }

  private codeHashOf(node: GraphNode): string {
    let hash = this.codeHashes.get(node.taskName);
    if (!hash) {
      hash = codeHash(node.definition);
      this.codeHashes.set(node.taskName, hash);
    }
    return hash;
  }

  private async expand(node: PatternNode): Promise<boolean> {
    const pattern = node.definition.pattern;
    try {
      const inputs: PatternInput[] = [];
      for (const ref of pattern.kind === "none" ? [] : pattern.refs) {
        const upstream = this.graph.require(ref);
        if (upstream.kind === "pattern") {
          inputs.push({ kind: "branches", ref, branchIds: upstream.branches ?? [] });
          continue;
        }
        const result = await this.store.get(ref);
        if (!result.found) throw new StorageReadError(ref, "value not found");
        inputs.push({ kind: "value", ref, value: result.value, format: upstream.definition.options.format });
      }

      const branches = expandPattern(this.graph, node, inputs);
      for (const branch of branches) this.selection?.add(branch.id);
      logger.debug(`Expanded "${node.id}"`, { branches: branches.length });
      this.notify(this.callbacks.onExpand, node.id, branches.map((b) => b.id));
    } catch (err) {
      await this.fail(node, err);
    }
    return true;
  }

  private async consolidate(node: PatternNode): Promise<boolean> {
    const def = node.definition;
    try {
      const branches = node.branches ?? [];
      let bytes = 0;
      const pairs = branches.map((id): [string, string] => {
        const record = this.store.getMetadata(id);
        if (!record?.valueHash) throw new StorageReadError(id, "no successful build is recorded");
        bytes += record.bytes;
        return [id, record.valueHash];
      });
      const current: CurrentFingerprint = { codeHash: this.codeHashOf(node), inputHashes: Object.fromEntries(pairs) };
      const valueHash = patternValueHash(pairs);
      node.fingerprint = nodeFingerprint(current);
      node.bytes = bytes;

      const record = this.store.getMetadata(node.id);
      const unchanged =
        record !== undefined &&
        record.error === null &&
        !record.invalidated &&
        record.valueHash === valueHash &&
        record.codeHash === current.codeHash &&
        !this.forced.has(node.taskName);
      if (unchanged) {
        node.status = "skipped";
        this.notify(this.callbacks.onNodeSkipped, toNodeReport(node));
        return true;
      }

      this.store.recordPattern(
        node.id,
        {
          nodeId: node.id,
          taskName: node.taskName,
          kind: "pattern",
          fingerprint: node.fingerprint,
          codeHash: current.codeHash,
          inputHashes: current.inputHashes,
          format: def.options.format,
          durationMs: 0,
          warnings: [],
          error: null,
          branches,
        },
        valueHash,
        bytes,
      );
      node.status = "completed";
      this.notify(this.callbacks.onNodeEnd, toNodeReport(node));
    } catch (err) {
      await this.fail(node, err);
    }
    return true;
  }

  /** Skip a fresh node, or dispatch a stale one if a slot is free. */
  private async gate(node: StaticNode | BranchNode): Promise<boolean> {
    let current: CurrentFingerprint;
    let staleness: Staleness;
    let recordedBytes: number | undefined;
    try {
      current = { codeHash: this.codeHashOf(node), inputHashes: inputHashes(this.graph, node, this.store) };
      staleness = await isStale(node.id, node.definition, current, this.store, {
        forced: this.forced.has(node.taskName),
      });
      if (!staleness.stale) recordedBytes = this.store.getMetadata(node.id)?.bytes;
    } catch (err) {
      await this.fail(node, err);
      return true;
    }

    if (!staleness.stale) {
      node.status = "skipped";
      node.fingerprint = nodeFingerprint(current);
      node.storageRef = undefined;
      node.bytes = recordedBytes;
      this.notify(this.callbacks.onNodeSkipped, toNodeReport(node));
      return true;
    }
    if (this.inflight.size >= this.limit) return false;

    const backend = this.backends.require(node.definition.options.deployment);
    node.status = "dispatched";
    node.fingerprint = nodeFingerprint(current);
    logger.debug(`Dispatching "${node.id}"`, { reason: staleness.reason, backend: backend.name });
    this.notify(this.callbacks.onNodeStart, toNodeReport(node));

    const running = this.execute(node, current, backend).finally(() => this.inflight.delete(node.id));
    this.inflight.set(node.id, running);
    return true;
  }

  private async execute(node: StaticNode | BranchNode, current: CurrentFingerprint, backend: WorkerBackend): Promise<void> {
    const def = node.definition;
    try {
      const args = await resolveArgs(this.graph, node, this.store);
      const outcome = await backend.execute({
        nodeId: node.id,
        taskName: node.taskName,
        compute: def.compute,
        args,
        branchIndex: node.kind === "branch" ? node.index : undefined,
        retries: def.options.retries,
        timeoutMs: def.options.timeoutMs,
        signal: this.signal,
      });
      node.durationMs = outcome.durationMs;
      node.warnings = outcome.warnings;

      if (outcome.status === "error") {
        if (outcome.error.code === "COMPUTATION_CANCELLED") {
          node.status = "pending";
          logger.info(`Cancelled "${node.id}"`);
          return;
        }
        throw outcome.error;
      }

      node.storageRef = await this.store.put(
        node.id,
        outcome.value,
        {
          nodeId: node.id,
          taskName: node.taskName,
          kind: node.kind,
          fingerprint: nodeFingerprint(current),
          codeHash: current.codeHash,
          inputHashes: current.inputHashes,
          format: def.options.format,
          durationMs: outcome.durationMs,
          warnings: outcome.warnings,
          error: null,
          branches: null,
        },
        { memory: def.options.memory },
      );
      node.bytes = node.storageRef.bytes;
      node.status = "completed";
      logger.debug(`Completed "${node.id}"`, { durationMs: outcome.durationMs, worker: outcome.worker });
      this.notify(this.callbacks.onNodeEnd, toNodeReport(node));
    } catch (err) {
      await this.fail(node, err, current);
    }
  }

  private async fail(node: GraphNode, err: unknown, current?: CurrentFingerprint): Promise<void> {
    const message = describeError(err);
    node.status = "errored";
    node.error = message;
    node.storageRef = undefined;
    node.bytes = undefined;
    logger.error(`Node "${node.id}" failed`, { error: message });

    try {
      await this.store.recordError(node.id, {
        nodeId: node.id,
        taskName: node.taskName,
        kind: node.kind,
        fingerprint: current ? nodeFingerprint(current) : "",
        codeHash: current?.codeHash ?? this.codeHashOf(node),
        inputHashes: current?.inputHashes ?? {},
        format: node.definition.options.format,
        durationMs: node.durationMs ?? 0,
        warnings: node.warnings,
        error: message,
        branches: null,
      });
    } catch (writeErr) {
      logger.error(`Could not record the failure of "${node.id}"`, { error: describeError(writeErr) });
    }
    this.notify(this.callbacks.onNodeEnd, toNodeReport(node));
  }

  private notify<A extends unknown[]>(callback: ((...args: A) => void) | undefined, ...args: A): void {
    if (!callback) return;
    try {
      callback(...args);
    } catch (err) {
      logger.warn("Run callback threw", { error: describeError(err) });
    }
  }

  private report(runId: string, start: number, cancelled: boolean): RunReport {
    const nodes = this.nodesInScope().map(toNodeReport);
    const counts: Record<NodeStatus, number> = { pending: 0, dispatched: 0, completed: 0, skipped: 0, errored: 0 };
    for (const n of nodes) counts[n.status]++;
    const errors = nodes.flatMap((n) => (n.status === "errored" ? [{ id: n.id, error: n.error ?? "unknown error" }] : []));
    return {
      runId,
      status: cancelled ? "cancelled" : errors.length > 0 ? "failed" : "completed",
      durationMs: Date.now() - start,
      nodes,
      errors,
      counts,
    };
  }
}
