/**
 * Redis Cache Store
 *
 * Shared cache for multi-node deployments. Redis expires keys natively via
 * `EX`; the stored payload still carries its write time so a hit can report
 * its age.
 *
 * @packageDocumentation
 */

import { createClient } from 'redis';
import { z } from 'zod';
import { formatError } from '../errors.js';
import { defaultLogger, type Logger } from '../logger.js';
import type { CacheEntry, CacheStore } from './store.js';

/**
 * The slice of a Redis client the store needs. Tests pass an in-memory fake.
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts: { EX: number }): Promise<void>;
  quit(): Promise<void>;
}

const StoredEntrySchema = z.object({
  v: z.string(),
  t: z.number(),
  ttl: z.number(),
});

export interface RedisStoreOptions {
  /** Verify the server certificate on `rediss://` (default: true) */
  tlsVerify?: boolean;
  /** Socket connect timeout (default: 2000) */
  connectTimeoutMs?: number;
  logger?: Logger;
}

export class RedisCacheStore implements CacheStore {
  readonly name = 'redis';
  private readonly client: RedisLike;
  private readonly connectFn: () => Promise<void>;
  private readonly logger: Logger;

  constructor(client: RedisLike, opts: { connect?: () => Promise<void>; logger?: Logger } = {}) {
    this.client = client;
    this.connectFn = opts.connect ?? (async () => {});
    this.logger = opts.logger ?? defaultLogger;
  }

  /**
   * Build a store around a real client. Call {@link connect} before use;
   * commands issued while disconnected fail fast instead of queueing.
   */
  static fromUrl(url: string, opts: RedisStoreOptions = {}): RedisCacheStore {
    const logger = opts.logger ?? defaultLogger;
    const tlsVerify = opts.tlsVerify ?? true;
    const secure = url.startsWith('rediss://');
    const common = {
      connectTimeout: opts.connectTimeoutMs ?? 2000,
      reconnectStrategy: (retries: number) => Math.min(retries * 100, 3000),
    };
    if (secure && !tlsVerify) {
      logger.warn('Redis TLS certificate verification is disabled');
    }
    const socket = secure ? { ...common, tls: true as const, rejectUnauthorized: tlsVerify } : common;

    const client = createClient({ url, disableOfflineQueue: true, socket });
    client.on('error', (err: unknown) => {
      logger.warn(`Redis client error: ${formatError(err)}`);
    });

    const adapter: RedisLike = {
      get: async (key) => {
        const v = await client.get(key);
        return v === null ? null : String(v);
      },
      set: async (key, value, setOpts) => {
        await client.set(key, value, setOpts);
      },
      quit: async () => {
        if (client.isReady) await client.quit();
        else if (client.isOpen) await client.disconnect();
      },
    };

    return new RedisCacheStore(adapter, {
      logger,
      connect: async () => {
        await client.connect();
      },
    });
  }

  async connect(): Promise<void> {
    await this.connectFn();
  }

  async get(key: string): Promise<CacheEntry | null> {
    const raw = await this.client.get(key);
    if (raw === null) return null;
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      this.logger.warn(`Discarding undecodable cache entry ${key}`);
      return null;
    }
    const parsed = StoredEntrySchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn(`Discarding malformed cache entry ${key}`);
      return null;
    }
    return { value: parsed.data.v, storedAt: parsed.data.t, ttlSeconds: parsed.data.ttl };
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    const payload = JSON.stringify({ v: entry.value, t: entry.storedAt, ttl: entry.ttlSeconds });
    await this.client.set(key, payload, { EX: Math.max(1, Math.ceil(entry.ttlSeconds)) });
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
