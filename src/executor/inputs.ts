import { StorageReadError } from "../errors.js";
import type { Graph, GraphNode } from "../graph/types.js";
import { literalHash } from "../invalidation/invalidation.js";
import type { FingerprintStore } from "../store/fingerprint-store.js";

/** Key of an argument in a record's `inputHashes`: `<position>:<task name | literal>`. */
export function argKey(index: number, name?: string): string {
  return `${index}:${name ?? "literal"}`;
}

function recordedValueHash(store: FingerprintStore, nodeId: string): string {
  const record = store.getMetadata(nodeId);
  if (!record || record.valueHash === null) {
    throw new StorageReadError(nodeId, "no successful build is recorded");
  }
  return record.valueHash;
}

/**
 * Hashes of the values each argument of `node` receives, read from the
 * upstream records. Every upstream must already have a successful record.
 */
export function inputHashes(graph: Graph, node: GraphNode, store: FingerprintStore): Record<string, string> {
  const hashes: Record<string, string> = {};
  node.definition.args.forEach((arg, i) => {
    if (arg.kind === "literal") {
      hashes[argKey(i)] = literalHash(arg.value);
      return;
    }
    const slice = node.kind === "branch" ? node.slices.find((s) => s.ref === arg.name) : undefined;
    if (!slice) {
      hashes[argKey(i, arg.name)] = recordedValueHash(store, arg.name);
    } else if (graph.get(slice.sourceId)?.kind === "branch") {
      hashes[argKey(i, arg.name)] = recordedValueHash(store, slice.sourceId);
    } else {
      // Elements of a static value are identified by their content hash.
      hashes[argKey(i, arg.name)] = slice.identity;
    }
  });
  return hashes;
}

async function load(store: FingerprintStore, nodeId: string): Promise<unknown> {
  const result = await store.get(nodeId);
  if (!result.found) throw new StorageReadError(nodeId, "value not found");
  return result.value;
}

/**
 * The argument values `node` is called with. A whole pattern upstream arrives
 * as the ordered array of its branch values; a branch's pattern arguments
 * arrive as the single element it was expanded for.
 */
export async function resolveArgs(graph: Graph, node: GraphNode, store: FingerprintStore): Promise<unknown[]> {
  const values: unknown[] = [];
  for (const arg of node.definition.args) {
    if (arg.kind === "literal") {
      values.push(arg.value);
      continue;
    }
    const slice = node.kind === "branch" ? node.slices.find((s) => s.ref === arg.name) : undefined;
    if (!slice) {
      values.push(await load(store, arg.name));
    } else if (graph.get(slice.sourceId)?.kind === "branch") {
      values.push(await load(store, slice.sourceId));
    } else {
      const whole = await load(store, slice.sourceId);
      if (!Array.isArray(whole) || slice.index >= whole.length) {
        throw new StorageReadError(slice.sourceId, `element ${slice.index} is not available`);
      }
      values.push(whole[slice.index]);
    }
  }
  return values;
}
