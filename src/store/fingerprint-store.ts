import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { getConfig } from "../config.js";
import { StorageReadError, StorageWriteError } from "../errors.js";
import type { MemoryPolicy } from "../plan/types.js";
import { Cache } from "../utils/cache.js";
import { log } from "../utils/logger.js";
import { FileSystemBlobBackend, MemoryBlobBackend } from "./backends.js";
import { deserialize, serialize, sha256 } from "./codec.js";
import { SqliteMetadataTable } from "./metadata.js";
import type { BlobBackend, FingerprintRecord, Lookup, MetadataTable, RecordInput, StorageRef } from "./types.js";

const logger = log.child("store");

export type FingerprintStoreOptions = {
  blobs: BlobBackend;
  metadata: MetadataTable;
  /** Capacity of the in-memory value cache behind the `retain` policy. */
  cacheEntries?: number;
};

/**
 * Content-addressed persistence of node values and their provenance.
 *
 * Each node owns exactly one blob key and one metadata row, so writes for
 * different nodes never conflict. A value becomes visible to `get` only once
 * its metadata row has been written after the blob.
 */
export class FingerprintStore {
  private blobs: BlobBackend;
  private metadata: MetadataTable;
  private values: Cache<unknown>;

  constructor(opts: FingerprintStoreOptions) {
    this.blobs = opts.blobs;
    this.metadata = opts.metadata;
    this.values = new Cache({ maxEntries: opts.cacheEntries ?? getConfig().cache.maxEntries });
  }

  /** Serialize, write and record a value. The metadata row is committed last. */
  async put(
    nodeId: string,
    value: unknown,
    input: RecordInput,
    opts?: { memory?: MemoryPolicy },
  ): Promise<StorageRef> {
    let bytes: Uint8Array;
    try {
      bytes = serialize(value, input.format);
    } catch (err) {
      throw new StorageWriteError(nodeId, err);
    }
    const valueHash = sha256(bytes);

    let location: string;
    try {
      location = await this.blobs.write(nodeId, bytes);
      this.metadata.upsert({
        ...input,
        nodeId,
        valueHash,
        bytes: bytes.byteLength,
        invalidated: false,
        builtAt: Date.now(),
      });
    } catch (err) {
      this.values.delete(nodeId);
      throw new StorageWriteError(nodeId, err);
    }

    if ((opts?.memory ?? "retain") === "retain") {
      this.values.set(nodeId, value);
    } else {
      this.values.delete(nodeId);
    }
    logger.debug("Stored value", { nodeId, bytes: bytes.byteLength, format: input.format });
    return { nodeId, location, format: input.format, bytes: bytes.byteLength, valueHash };
  }

  /** Record a failed build. The node's previous value is removed. */
  async recordError(nodeId: string, input: RecordInput): Promise<void> {
    this.values.delete(nodeId);
    try {
      await this.blobs.delete(nodeId);
      this.metadata.upsert({ ...input, nodeId, valueHash: null, bytes: 0, invalidated: false, builtAt: Date.now() });
    } catch (err) {
      throw new StorageWriteError(nodeId, err);
    }
  }

  /**
   * Record a consolidated pattern node. It owns no blob: its value is the
   * ordered list of its branches' values, and `valueHash` summarizes them.
   * `bytes` is the branches' total.
   */
  recordPattern(nodeId: string, input: RecordInput, valueHash: string, bytes = 0): void {
    try {
      this.metadata.upsert({ ...input, nodeId, valueHash, bytes, invalidated: false, builtAt: Date.now() });
    } catch (err) {
      throw new StorageWriteError(nodeId, err);
    }
  }

  /** Read a value. Misses are returned, not thrown. */
  async get(nodeId: string, opts?: { retain?: boolean }): Promise<Lookup<unknown>> {
    const record = this.getMetadata(nodeId);
    if (!record || record.valueHash === null) return { found: false, nodeId };

    if (record.kind === "pattern") {
      const values: unknown[] = [];
      for (const branch of record.branches ?? []) {
        const result = await this.get(branch, opts);
        if (!result.found) return { found: false, nodeId };
        values.push(result.value);
      }
      return { found: true, value: values };
    }

    const cached = this.values.get(nodeId);
    if (cached.hit) return { found: true, value: cached.value };

    let bytes: Uint8Array | undefined;
    try {
      bytes = await this.blobs.read(nodeId);
    } catch (err) {
      throw new StorageReadError(nodeId, err);
    }
    if (!bytes) return { found: false, nodeId };
    if (sha256(bytes) !== record.valueHash) {
      throw new StorageReadError(nodeId, "stored blob does not match its recorded hash");
    }

    let value: unknown;
    try {
      value = deserialize(bytes, record.format);
    } catch (err) {
      throw new StorageReadError(nodeId, err);
    }
    if (opts?.retain) this.values.set(nodeId, value);
    return { found: true, value };
  }

  getMetadata(nodeId: string): FingerprintRecord | undefined {
    try {
      return this.metadata.get(nodeId);
    } catch (err) {
      throw new StorageReadError(nodeId, err);
    }
  }

  /** Whether the stored value behind a record is still present. */
  async hasValue(nodeId: string): Promise<boolean> {
    const record = this.getMetadata(nodeId);
    if (!record || record.valueHash === null) return false;
    if (record.kind === "pattern") {
      for (const branch of record.branches ?? []) {
        if (!(await this.hasValue(branch))) return false;
      }
      return true;
    }
    if (this.values.has(nodeId)) return true;
    try {
      return await this.blobs.exists(nodeId);
    } catch (err) {
      throw new StorageReadError(nodeId, err);
    }
  }

  /** Force-mark records stale without deleting their values. */
  invalidate(nodeIds: string[]): number {
    return this.metadata.setInvalidated(nodeIds, true);
  }

  /** Remove records and values. Returns the number of records removed. */
  async delete(nodeIds: string[]): Promise<number> {
    for (const id of nodeIds) {
      this.values.delete(id);
      await this.blobs.delete(id);
    }
    return this.metadata.delete(nodeIds);
  }

  list(): FingerprintRecord[] {
    return this.metadata.list();
  }

  /** Keys present in the blob area, including blobs no record points to. */
  blobKeys(): Promise<string[]> {
    return this.blobs.keys();
  }

  /** Drop retained values; stored data is untouched. */
  releaseMemory(): void {
    this.values.clear();
  }

  cacheStats() {
    return this.values.getStats();
  }

  close(): void {
    this.values.clear();
    this.metadata.close();
  }
}

/** Open (or create) the store under `root`: `<root>/meta.db` and `<root>/objects/`. */
export function openStore(root?: string): FingerprintStore {
  const cfg = getConfig().store;
  const dir = root ?? cfg.root;
  mkdirSync(dir, { recursive: true });
  return new FingerprintStore({
    blobs: new FileSystemBlobBackend(join(dir, cfg.objectsDir)),
    metadata: new SqliteMetadataTable(join(dir, cfg.metadataFile)),
  });
}

/** A store that lives only as long as the process. */
export function openMemoryStore(): FingerprintStore {
  return new FingerprintStore({
    blobs: new MemoryBlobBackend(),
    metadata: new SqliteMetadataTable(":memory:"),
  });
}
