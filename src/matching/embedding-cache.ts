/**
 * NewsRelay — Embedding Cache
 *
 * Bounded map from item URL to computed embeddings.
 * Map insertion order doubles as recency order: a touched key is
 * re-inserted at the end, so the first key is always the LRU one.
 *
 * Recency and age are separate. `createdAt` is stamped on first insert
 * and never refreshed, so pruning by age works even for hot entries.
 */

import { Mutex } from '../lib/mutex';

// ============================================================
// TYPES
// ============================================================

export interface CacheEntry<V> {
  key: string;
  value: V;
  /** Epoch millis of first insertion */
  createdAt: number;
}

export interface PruneStats {
  before: number;
  after: number;
  removed: number;
}

export interface CacheDescription {
  size: number;
  capacity: number;
  olderThanMaxAge: number;
  oldestAgeMs: number | null;
  newestAgeMs: number | null;
}

export interface EmbeddingCacheOptions {
  capacity: number;
  now?: () => number;
}

// ============================================================
// CACHE
// ============================================================

export class EmbeddingCache<V> {
  readonly capacity: number;
  private readonly now: () => number;
  private entries = new Map<string, CacheEntry<V>>();
  private readonly mutex = new Mutex();

  constructor(options: EmbeddingCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Read a value and mark it most recently used.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  /**
   * Insert or overwrite. Overwrites keep the original createdAt.
   */
  put(key: string, value: V): void {
    const existing = this.entries.get(key);
    const createdAt = existing?.createdAt ?? this.now();
    this.entries.delete(key);
    this.entries.set(key, { key, value, createdAt });
    while (this.entries.size > this.capacity) {
      this.evictLru();
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop the least recently touched entry. Returns its key.
   */
  evictLru(): string | undefined {
    const oldest = this.entries.keys().next();
    if (oldest.done) return undefined;
    this.entries.delete(oldest.value);
    return oldest.value;
  }

  /**
   * Keep entries whose key is in `keepKeys` or that are younger than `maxAgeMs`.
   * Recency order of the survivors is preserved.
   */
  prune(keepKeys: ReadonlySet<string>, maxAgeMs: number): PruneStats {
    const before = this.entries.size;
    const now = this.now();
    const kept = new Map<string, CacheEntry<V>>();

    for (const [key, entry] of this.entries) {
      if (keepKeys.has(key) || now - entry.createdAt < maxAgeMs) {
        kept.set(key, entry);
      }
    }

    this.entries = kept;
    return { before, after: kept.size, removed: before - kept.size };
  }

  /**
   * Serialized read-compute-insert. Concurrent callers for the same key
   * compute once; the second caller sees the first caller's value.
   */
  async getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    return this.mutex.runExclusive(async () => {
      const cached = this.get(key);
      if (cached !== undefined) return cached;
      const value = await compute();
      this.put(key, value);
      return value;
    });
  }

  describe(maxAgeMs: number): CacheDescription {
    const now = this.now();
    let olderThanMaxAge = 0;
    let oldest: number | null = null;
    let newest: number | null = null;

    for (const entry of this.entries.values()) {
      const age = now - entry.createdAt;
      if (age >= maxAgeMs) olderThanMaxAge++;
      if (oldest === null || age > oldest) oldest = age;
      if (newest === null || age < newest) newest = age;
    }

    return {
      size: this.entries.size,
      capacity: this.capacity,
      olderThanMaxAge,
      oldestAgeMs: oldest,
      newestAgeMs: newest,
    };
  }

  /**
   * Entries from least to most recently used.
   */
  snapshot(): CacheEntry<V>[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  /**
   * Replace contents with snapshot entries, in the order given.
   * Only the most recent `capacity` entries survive.
   */
  restore(entries: readonly CacheEntry<V>[]): void {
    this.entries = new Map();
    for (const entry of entries.slice(-this.capacity)) {
      this.entries.delete(entry.key);
      this.entries.set(entry.key, { ...entry });
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
