/**
 * Response Cache
 *
 * Read-through cache in front of the upstream proxy. The cache is strictly
 * an optimisation: a slow or failing store is logged and reported as a
 * miss, never as a request failure.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { formatError } from '../errors.js';
import { defaultLogger, type Logger } from '../logger.js';
import type { EndpointName } from '../routing/endpoints.js';
import type { PassthroughBody } from '../routing/envelope.js';
import type { RoutingDecision } from '../types.js';
import { buildCacheKey } from './key.js';
import { isFresh, type CacheStore } from './store.js';

/**
 * What gets replayed on a hit.
 */
export interface CachedResponse {
  status: number;
  contentType: string;
  body: string;
}

const CachedResponseSchema = z.object({
  status: z.number().int(),
  contentType: z.string(),
  body: z.string(),
});

export interface ResponseCacheOptions {
  store: CacheStore;
  /** Default TTL for {@link ResponseCache.store} (default: 60) */
  ttlSeconds?: number;
  /** Per store call budget before giving up with a miss (default: 1000) */
  opTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface CacheCounters {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
}

const TIMED_OUT: unique symbol = Symbol('timed-out');

export class ResponseCache {
  private readonly backing: CacheStore;
  private readonly ttlSeconds: number;
  private readonly opTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly counters: CacheCounters = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(opts: ResponseCacheOptions) {
    this.backing = opts.store;
    this.ttlSeconds = opts.ttlSeconds ?? 60;
    this.opTimeoutMs = Math.max(1, opts.opTimeoutMs ?? 1000);
    this.logger = opts.logger ?? defaultLogger;
    this.now = opts.now ?? Date.now;
  }

  keyFor(endpoint: EndpointName, decision: RoutingDecision, body: PassthroughBody): string {
    return buildCacheKey(endpoint, decision, body);
  }

  async lookup(endpoint: EndpointName, decision: RoutingDecision, body: PassthroughBody): Promise<CachedResponse | null> {
    const key = this.keyFor(endpoint, decision, body);
    const entry = await this.guarded('get', key, () => this.backing.get(key));
    if (!entry || !isFresh(entry, this.now())) {
      this.counters.misses++;
      return null;
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(entry.value);
    } catch {
      decoded = null;
    }
    const parsed = CachedResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed cache entry ${key}`);
      this.counters.misses++;
      return null;
    }
    this.counters.hits++;
    return parsed.data;
  }

  async store(
    endpoint: EndpointName,
    decision: RoutingDecision,
    body: PassthroughBody,
    response: CachedResponse,
    ttlSeconds = this.ttlSeconds,
  ): Promise<void> {
    const key = this.keyFor(endpoint, decision, body);
    const value = JSON.stringify({ status: response.status, contentType: response.contentType, body: response.body });
    const entry = { value, storedAt: this.now(), ttlSeconds };
    const done = await this.guarded('set', key, async () => {
      await this.backing.set(key, entry);
      return true;
    });
    if (done) this.counters.writes++;
  }

  getCounters(): CacheCounters {
    return { ...this.counters };
  }

  async close(): Promise<void> {
    await this.backing.close();
  }

  /**
   * Run a store call under the op budget. Errors and timeouts yield undefined.
   */
  private async guarded<T>(op: 'get' | 'set', key: string, run: () => Promise<T>): Promise<T | undefined> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.opTimeoutMs);
    });
    const task = run();
    try {
      const result = await Promise.race([task, timeout]);
      if (result === TIMED_OUT) {
        this.counters.errors++;
        this.logger.warn(`Cache ${op} timed out after ${this.opTimeoutMs}ms (${this.backing.name})`);
        void task.catch((err: unknown) => {
          this.logger.debug(`Late cache ${op} failure: ${formatError(err)}`);
        });
        return undefined;
      }
      return result;
    } catch (err) {
      this.counters.errors++;
      this.logger.warn(`Cache ${op} failed for ${key} (${this.backing.name}): ${formatError(err)}`);
      return undefined;
    } finally {
      clearTimeout(timer);
    }
  }
}
