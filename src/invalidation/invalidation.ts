import type { TaskDefinition } from "../plan/types.js";
import { canonicalJson, hashValue, sha256 } from "../store/codec.js";
import type { FingerprintStore } from "../store/fingerprint-store.js";

export type StaleReason =
  | "fresh"
  | "forced"
  | "cue-always"
  | "missing"
  | "errored"
  | "invalidated"
  | "code-changed"
  | "format-changed"
  | "inputs-changed"
  | "value-missing"
  | "upstream-stale"
  | "expansion-failed";

export type Staleness = {
  stale: boolean;
  reason: StaleReason;
  /** Input keys whose hashes differ from the recorded ones. */
  changedInputs?: string[];
};

/** What a node would be built from right now. */
export type CurrentFingerprint = {
  codeHash: string;
  inputHashes: Record<string, string>;
};

/**
 * Hash of everything about a task that changes its output besides its
 * inputs and storage format: the function text, the pattern and `version`.
 */
export function codeHash(def: TaskDefinition): string {
  return sha256(
    canonicalJson({
      source: def.compute.toString(),
      pattern: def.pattern.kind === "none" ? "none" : `${def.pattern.kind}(${def.pattern.refs.join(",")})`,
      version: def.options.version ?? null,
    }),
  );
}

/** Literals are hashed as canonical JSON, falling back to structured serialization. */
export function literalHash(value: unknown): string {
  try {
    return hashValue(value, "json");
  } catch {
    return hashValue(value, "v8");
  }
}

export function nodeFingerprint(current: CurrentFingerprint): string {
  return sha256(canonicalJson({ code: current.codeHash, inputs: current.inputHashes }));
}

/** Summary hash of a consolidated pattern: its branch ids and their value hashes, in order. */
export function patternValueHash(branches: ReadonlyArray<readonly [string, string]>): string {
  return sha256(canonicalJson(branches.map(([id, hash]) => [id, hash])));
}

export type StalenessOptions = {
  forced?: boolean;
};

/**
 * Decide whether a node must rebuild. Freshness is value-based: a node whose
 * code hash and input hashes equal the recorded ones is fresh, whatever
 * happened further upstream.
 */
export async function isStale(
  nodeId: string,
  def: TaskDefinition,
  current: CurrentFingerprint,
  store: FingerprintStore,
  opts: StalenessOptions = {},
): Promise<Staleness> {
  if (opts.forced) return { stale: true, reason: "forced" };
  if (def.options.cue === "always") return { stale: true, reason: "cue-always" };

  const record = store.getMetadata(nodeId);
  if (!record) return { stale: true, reason: "missing" };
  if (record.error !== null || record.valueHash === null) return { stale: true, reason: "errored" };
  if (record.invalidated) return { stale: true, reason: "invalidated" };

  if (def.options.cue !== "never") {
    if (record.codeHash !== current.codeHash) return { stale: true, reason: "code-changed" };
    if (record.format !== def.options.format) return { stale: true, reason: "format-changed" };

    const changedInputs = diffKeys(record.inputHashes, current.inputHashes);
    if (changedInputs.length > 0) return { stale: true, reason: "inputs-changed", changedInputs };
  }

  if (!(await store.hasValue(nodeId))) return { stale: true, reason: "value-missing" };
  return { stale: false, reason: "fresh" };
}

function diffKeys(recorded: Record<string, string>, current: Record<string, string>): string[] {
  const keys = new Set([...Object.keys(recorded), ...Object.keys(current)]);
  return [...keys].filter((k) => recorded[k] !== current[k]).sort();
}
