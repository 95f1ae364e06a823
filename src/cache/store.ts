/**
 * Cache store contract and the in-process implementation.
 *
 * @packageDocumentation
 */

export interface CacheEntry {
  /** Serialized cached response */
  value: string;
  /** Epoch ms at write time */
  storedAt: number;
  ttlSeconds: number;
}

/**
 * Key/value store with per-key TTL. Implementations may expire natively or
 * leave staleness to {@link isFresh} at read time.
 */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<CacheEntry | null>;
  set(key: string, entry: CacheEntry): Promise<void>;
  close(): Promise<void>;
}

export function isFresh(entry: CacheEntry, nowMs = Date.now()): boolean {
  return entry.storedAt + entry.ttlSeconds * 1000 > nowMs;
}

export interface MemoryCacheStoreOptions {
  /** LRU bound (default: 10000) */
  maxEntries?: number;
  now?: () => number;
}

// Per-process LRU with passive expiry
export class MemoryCacheStore implements CacheStore {
  readonly name = 'memory';
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly map = new Map<string, CacheEntry>();

  constructor(opts: MemoryCacheStoreOptions = {}) {
    this.maxEntries = Math.max(1, Math.trunc(opts.maxEntries ?? 10_000));
    this.now = opts.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const hit = this.map.get(key);
    if (!hit) return null;
    if (!isFresh(hit, this.now())) {
      this.map.delete(key);
      return null;
    }
    // LRU bump
    this.map.delete(key);
    this.map.set(key, hit);
    return hit;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, entry);
    this.evict();
  }

  async close(): Promise<void> {
    this.map.clear();
  }

  size(): number {
    return this.map.size;
  }

  private evict(): void {
    while (this.map.size > this.maxEntries) {
      const oldest = this.map.keys().next();
      if (oldest.done) return;
      this.map.delete(oldest.value);
    }
  }
}
