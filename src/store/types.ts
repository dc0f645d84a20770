import type { NodeKind } from "../graph/types.js";
import type { StorageFormat } from "../plan/types.js";

/** Provenance of a built node, one row per node id in the metadata table. */
export type FingerprintRecord = {
  nodeId: string;
  taskName: string;
  kind: NodeKind;
  /** Hash of `codeHash` and every input hash. */
  fingerprint: string;
  codeHash: string;
  /** Argument key (`<index>:<ref name | literal>`) to the hash of the value it received. */
  inputHashes: Record<string, string>;
  /** Hash of the stored value; null when the last build errored. */
  valueHash: string | null;
  format: StorageFormat;
  durationMs: number;
  bytes: number;
  warnings: string[];
  error: string | null;
  /** Set by `invalidate`; cleared by the next successful build. */
  invalidated: boolean;
  builtAt: number;
  /** Ordered branch ids, for pattern nodes only. */
  branches: string[] | null;
};

/** Fields the caller supplies; the store derives the rest from the value. */
export type RecordInput = Omit<FingerprintRecord, "valueHash" | "bytes" | "invalidated" | "builtAt">;

export type StorageRef = {
  nodeId: string;
  /** Where the blob lives: a file path or a backend-specific key. */
  location: string;
  format: StorageFormat;
  bytes: number;
  valueHash: string;
};

export type Lookup<T> = { found: true; value: T } | { found: false; nodeId: string };

/**
 * Blob area keyed by node id. `write` must be atomic: a reader sees either the
 * previous blob or the complete new one.
 */
export interface BlobBackend {
  readonly kind: string;
  write(key: string, bytes: Uint8Array): Promise<string>;
  read(key: string): Promise<Uint8Array | undefined>;
  exists(key: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
}

/** Metadata table: one row per node id. */
export interface MetadataTable {
  upsert(record: FingerprintRecord): void;
  get(nodeId: string): FingerprintRecord | undefined;
  list(): FingerprintRecord[];
  setInvalidated(nodeIds: string[], invalidated: boolean): number;
  delete(nodeIds: string[]): number;
  close(): void;
}
