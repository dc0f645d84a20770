import { randomUUID } from "node:crypto";
import { mkdir, open, readdir, readFile, rename, rm, stat, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { BlobBackend } from "./types.js";

const TMP_PREFIX = ".tmp-";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * One file per node id under `dir`. Writes go to a temporary file in the same
 * directory and are renamed into place, so a crash mid-write never leaves a
 * truncated blob under the node's key.
 */
export class FileSystemBlobBackend implements BlobBackend {
  readonly kind = "filesystem";
  private ready?: Promise<void>;

  constructor(readonly dir: string) {}

  private ensureDir(): Promise<void> {
    this.ready ??= mkdir(this.dir, { recursive: true }).then(() => undefined);
    return this.ready;
  }

  async write(key: string, bytes: Uint8Array): Promise<string> {
    await this.ensureDir();
    const target = join(this.dir, key);
    const tmp = join(this.dir, `${TMP_PREFIX}${key}-${randomUUID().slice(0, 8)}`);
    try {
      const handle = await open(tmp, "w");
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    return target;
  }

  async read(key: string): Promise<Uint8Array | undefined> {
    try {
      return await readFile(join(this.dir, key));
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await stat(join(this.dir, key))).isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(join(this.dir, key));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async keys(): Promise<string[]> {
    try {
      const names = await readdir(this.dir);
      return names.filter((n) => !n.startsWith(TMP_PREFIX)).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }
}

/** Blob area held in a Map. Bytes are copied in and out. */
export class MemoryBlobBackend implements BlobBackend {
  readonly kind = "memory";
  private blobs = new Map<string, Uint8Array>();

  async write(key: string, bytes: Uint8Array): Promise<string> {
    this.blobs.set(key, Uint8Array.from(bytes));
    return `memory://${key}`;
  }

  async read(key: string): Promise<Uint8Array | undefined> {
    const blob = this.blobs.get(key);
    return blob ? Uint8Array.from(blob) : undefined;
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.blobs.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.blobs.keys()].sort();
  }
}
