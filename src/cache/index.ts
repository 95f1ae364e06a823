/**
 * Cache module exports and store selection.
 *
 * @packageDocumentation
 */

import { ConfigError } from '../errors.js';
import { defaultLogger, type Logger } from '../logger.js';
import { RedisCacheStore } from './redis-store.js';
import { SqliteCacheStore } from './sqlite-store.js';
import { MemoryCacheStore, type CacheStore } from './store.js';

export { ResponseCache } from './layer.js';
export type { CachedResponse, CacheCounters, ResponseCacheOptions } from './layer.js';
export { buildCacheKey, normalizeBody, sha256Hex, CACHE_KEY_PREFIX } from './key.js';
export { MemoryCacheStore, isFresh } from './store.js';
export type { CacheEntry, CacheStore, MemoryCacheStoreOptions } from './store.js';
export { SqliteCacheStore, CACHE_SCHEMA_SQL } from './sqlite-store.js';
export { RedisCacheStore } from './redis-store.js';
export type { RedisLike, RedisStoreOptions } from './redis-store.js';
export { SingleFlight } from './single-flight.js';

export interface CacheStoreSettings {
  url: string;
  tlsVerify: boolean;
}

/**
 * Pick a store from the cache URL scheme:
 * `redis://` / `rediss://`, `sqlite:<path>` or `memory://`.
 * Redis stores are returned unconnected.
 */
export function createCacheStore(settings: CacheStoreSettings, logger: Logger = defaultLogger): CacheStore {
  const url = settings.url.trim();
  if (url.startsWith('redis://') || url.startsWith('rediss://')) {
    return RedisCacheStore.fromUrl(url, { tlsVerify: settings.tlsVerify, logger });
  }
  if (url.startsWith('sqlite:')) {
    const dbPath = url.slice('sqlite:'.length).replace(/^\/\//, '');
    if (!dbPath) throw new ConfigError('CACHE_URL: sqlite store needs a path, e.g. sqlite:./cache.db');
    return new SqliteCacheStore(dbPath);
  }
  if (url === 'memory://' || url === 'memory:') {
    return new MemoryCacheStore();
  }
  throw new ConfigError(`CACHE_URL: unsupported scheme in "${url}"`);
}
