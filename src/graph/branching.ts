/**
 * Dynamic branching: turning a pattern node into concrete branch nodes once
 * the upstream sequences it ranges over are known.
 *
 * `cross` enumerates combinations in row-major order: the first input varies
 * slowest, so `cross(A, B)` over `[1, 2]` and `[10, 20]` yields
 * `(1,10), (1,20), (2,10), (2,20)`. The order is only used for presentation and
 * for the order values are handed to consolidating tasks; branch identity comes
 * from the elements themselves.
 */
import { getConfig } from "../config.js";
import { PatternArityError, PatternInputError, ValidationError } from "../errors.js";
import type { PatternKind, StorageFormat } from "../plan/types.js";
import { hashValue, sha256 } from "../store/codec.js";
import { referencedTasks } from "./builder.js";
import type { BranchNode, BranchSlice, Graph, PatternNode } from "./types.js";

/** A realized upstream sequence a pattern ranges over. */
export type PatternInput =
  | {
      /** Elements of a static task's value, which must be an array. */
      kind: "value";
      ref: string;
      value: unknown;
      format: StorageFormat;
    }
  | {
      /** The branches of an upstream pattern, in its expansion order. */
      kind: "branches";
      ref: string;
      branchIds: string[];
    };

export type Element = { identity: string; sourceId: string };

/**
 * Stable identities for the elements of one input. Elements of a static value
 * are identified by content hash, with a `#k` suffix on the k-th repeat of an
 * equal element; branches of an upstream pattern by their branch id.
 */
export function elementIdentities(pattern: string, input: PatternInput): Element[] {
  if (input.kind === "branches") {
    return input.branchIds.map((id) => ({ identity: id, sourceId: id }));
  }
  if (!Array.isArray(input.value)) {
    const actual = input.value === null ? "null" : typeof input.value;
    throw new PatternInputError(pattern, input.ref, actual);
  }
  const seen = new Map<string, number>();
  return input.value.map((el: unknown) => {
    const hash = hashValue(el, input.format).slice(0, 16);
    const occurrence = seen.get(hash) ?? 0;
    seen.set(hash, occurrence + 1);
    const identity = occurrence === 0 ? `${input.ref}@${hash}` : `${input.ref}@${hash}#${occurrence}`;
    return { identity, sourceId: input.ref };
  });
}

/**
 * Index tuples of the expansion set. Each tuple holds one index per input.
 * Throws PatternArityError when `map` inputs differ in length.
 */
export function expansionSet(kind: PatternKind, pattern: string, lengths: Array<[string, number]>): number[][] {
  if (lengths.length === 0) {
    throw new ValidationError("VALIDATION_FAILED", `Pattern "${pattern}" has no inputs`);
  }

  if (kind === "map") {
    const first = lengths[0][1];
    if (lengths.some(([, len]) => len !== first)) {
      throw new PatternArityError(pattern, Object.fromEntries(lengths));
    }
    return Array.from({ length: first }, (_, i) => lengths.map(() => i));
  }

  if (lengths.some(([, len]) => len === 0)) return [];
  const tuples: number[][] = [];
  const current = lengths.map(() => 0);
  for (;;) {
    tuples.push([...current]);
    // Odometer: the last input turns fastest.
    let pos = current.length - 1;
    while (pos >= 0) {
      current[pos]++;
      if (current[pos] < lengths[pos][1]) break;
      current[pos] = 0;
      pos--;
    }
    if (pos < 0) return tuples;
  }
}

/** Deterministic branch id from the pattern name and the identities it draws from. */
export function branchId(pattern: string, identities: readonly string[]): string {
  const digest = sha256(JSON.stringify([pattern, identities]));
  return `${pattern}_${digest.slice(0, getConfig().hashing.branchIdLength)}`;
}

/**
 * Materialize the branches of `node` over `inputs` (given in the order of the
 * pattern's references), splice them into the graph and make the pattern node
 * depend on them. Returns the new pending branch nodes.
 */
export function expandPattern(graph: Graph, node: PatternNode, inputs: PatternInput[]): BranchNode[] {
  const def = node.definition;
  if (def.pattern.kind === "none") {
    throw new ValidationError("VALIDATION_FAILED", `Task "${def.name}" has no pattern`);
  }
  if (node.branches) {
    throw new ValidationError("VALIDATION_FAILED", `Pattern "${node.id}" is already expanded`);
  }
  const refs = def.pattern.refs;
  if (inputs.length !== refs.length || inputs.some((input, i) => input.ref !== refs[i])) {
    throw new ValidationError("VALIDATION_FAILED", `Pattern "${node.id}" expects inputs for ${refs.join(", ")}`);
  }

  const elements = inputs.map((input) => elementIdentities(node.id, input));
  const tuples = expansionSet(
    def.pattern.kind,
    node.id,
    elements.map((els, i) => [refs[i], els.length]),
  );

  const patternRefs = new Set(refs);
  const wholeDeps = referencedTasks(def).filter((name) => !patternRefs.has(name));

  const branches: BranchNode[] = tuples.map((tuple, index) => {
    const slices: BranchSlice[] = tuple.map((elementIndex, i) => {
      const element = elements[i][elementIndex];
      return { ref: refs[i], index: elementIndex, identity: element.identity, sourceId: element.sourceId };
    });
    const id = branchId(node.id, slices.map((s) => s.identity));
    const dependsOn = [...new Set([...wholeDeps, ...slices.map((s) => s.sourceId)])];
    return {
      id,
      kind: "branch",
      taskName: def.name,
      definition: def,
      dependsOn,
      status: "pending",
      warnings: [],
      patternId: node.id,
      index,
      slices,
    };
  });

  for (const branch of branches) {
    graph.add(branch);
    graph.addEdge(branch.id, node.id);
  }
  node.branches = branches.map((b) => b.id);
  return branches;
}
