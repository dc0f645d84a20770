import { log } from "./logger.js";

export type CacheOptions = {
  /** Maximum number of entries (default: 500). 0 disables caching. */
  maxEntries?: number;
};

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
};

const logger = log.child("cache");

/**
 * In-memory LRU cache of realized node values, keyed by node id.
 * Backs the `retain` memory policy so dependents skip a blob read.
 */
export class Cache<T> {
  private entries = new Map<string, { value: T }>();
  private maxEntries: number;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(opts: CacheOptions = {}) {
    this.maxEntries = opts.maxEntries ?? 500;
  }

  /** Returns `{ hit: false }` on a miss, so `undefined` values can be cached. */
  get(key: string): { hit: true; value: T } | { hit: false } {
    const entry = this.entries.get(key);
    if (!entry) {
      this.stats.misses++;
      return { hit: false };
    }
    this.stats.hits++;

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    return { hit: true, value: entry.value };
  }

  set(key: string, value: T): void {
    if (this.maxEntries === 0) return;
    this.entries.delete(key);

    // Evict oldest entries if at capacity
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.stats.evictions++;
      logger.debug("Evicted retained value", { nodeId: oldest.value });
    }

    this.entries.set(key, { value });
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      size: this.entries.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }
}
