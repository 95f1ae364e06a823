import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  MemoryCacheStore,
  RedisCacheStore,
  SingleFlight,
  SqliteCacheStore,
  createCacheStore,
  isFresh,
  type RedisLike,
} from '../src/cache/index.js';
import { ConfigError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';

/** In-process stand-in for the Redis commands the store uses. */
class FakeRedis implements RedisLike {
  readonly data = new Map<string, string>();
  readonly expiries = new Map<string, number>();
  failing = false;
  quitCalls = 0;

  async get(key: string): Promise<string | null> {
    if (this.failing) throw new Error('ECONNREFUSED');
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, opts: { EX: number }): Promise<void> {
    if (this.failing) throw new Error('ECONNREFUSED');
    this.data.set(key, value);
    this.expiries.set(key, opts.EX);
  }

  async quit(): Promise<void> {
    this.quitCalls++;
  }
}

describe('isFresh', () => {
  it('is fresh strictly before storedAt + ttl', () => {
    const entry = { value: 'v', storedAt: 1_000, ttlSeconds: 2 };
    expect(isFresh(entry, 2_999)).toBe(true);
    expect(isFresh(entry, 3_000)).toBe(false);
  });
});

describe('MemoryCacheStore', () => {
  let now = 0;
  let store: MemoryCacheStore;

  beforeEach(() => {
    now = 10_000;
    store = new MemoryCacheStore({ maxEntries: 2, now: () => now });
  });

  it('returns what was stored until the TTL elapses', async () => {
    await store.set('k', { value: 'v', storedAt: now, ttlSeconds: 5 });
    expect((await store.get('k'))?.value).toBe('v');
    now += 5_000;
    expect(await store.get('k')).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('overwrites idempotently', async () => {
    const entry = { value: 'v', storedAt: now, ttlSeconds: 5 };
    await store.set('k', entry);
    await store.set('k', entry);
    expect(await store.get('k')).toEqual(entry);
    expect(store.size()).toBe(1);
  });

  it('evicts the least recently used entry', async () => {
    await store.set('a', { value: '1', storedAt: now, ttlSeconds: 60 });
    await store.set('b', { value: '2', storedAt: now, ttlSeconds: 60 });
    await store.get('a');
    await store.set('c', { value: '3', storedAt: now, ttlSeconds: 60 });
    expect(await store.get('b')).toBeNull();
    expect((await store.get('a'))?.value).toBe('1');
    expect((await store.get('c'))?.value).toBe('3');
  });
});

describe('SqliteCacheStore', () => {
  let now = 0;
  let store: SqliteCacheStore;

  beforeEach(() => {
    now = 50_000;
    store = new SqliteCacheStore(':memory:', { now: () => now });
  });

  afterEach(async () => {
    await store.close();
  });

  it('round-trips an entry', async () => {
    await store.set('k', { value: '{"status":200}', storedAt: now, ttlSeconds: 10 });
    expect(await store.get('k')).toEqual({ value: '{"status":200}', storedAt: 50_000, ttlSeconds: 10 });
  });

  it('upserts on the same key', async () => {
    await store.set('k', { value: 'one', storedAt: now, ttlSeconds: 10 });
    await store.set('k', { value: 'two', storedAt: now, ttlSeconds: 10 });
    expect((await store.get('k'))?.value).toBe('two');
  });

  it('hides expired rows and purges them', async () => {
    await store.set('old', { value: 'x', storedAt: now, ttlSeconds: 1 });
    await store.set('new', { value: 'y', storedAt: now, ttlSeconds: 100 });
    now += 1_000;
    expect(await store.get('old')).toBeNull();
    expect(store.purgeExpired()).toBe(1);
    expect((await store.get('new'))?.value).toBe('y');
  });

  it('creates the parent directory of a file database', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'edge-router-sqlite-'));
    const dbPath = path.join(dir, 'nested', 'cache.db');
    const fileStore = new SqliteCacheStore(dbPath);
    try {
      expect(fs.existsSync(dbPath)).toBe(true);
      expect(fileStore.getDbPath()).toBe(dbPath);
    } finally {
      await fileStore.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('RedisCacheStore', () => {
  it('stores with a native expiry and reads back', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, { logger: silentLogger });

    await store.set('k', { value: 'payload', storedAt: 1_234, ttlSeconds: 60 });
    expect(redis.expiries.get('k')).toBe(60);
    expect(redis.data.get('k')).toBe('{"v":"payload","t":1234,"ttl":60}');
    expect(await store.get('k')).toEqual({ value: 'payload', storedAt: 1_234, ttlSeconds: 60 });
  });

  it('never sets an expiry below one second', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, { logger: silentLogger });
    await store.set('k', { value: 'v', storedAt: 0, ttlSeconds: 0.2 });
    expect(redis.expiries.get('k')).toBe(1);
  });

  it('treats malformed payloads as misses', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, { logger: silentLogger });
    redis.data.set('bad-json', '{nope');
    redis.data.set('bad-shape', '{"v":1}');
    expect(await store.get('bad-json')).toBeNull();
    expect(await store.get('bad-shape')).toBeNull();
    expect(await store.get('absent')).toBeNull();
  });

  it('propagates client errors to the caller', async () => {
    const redis = new FakeRedis();
    redis.failing = true;
    const store = new RedisCacheStore(redis, { logger: silentLogger });
    await expect(store.get('k')).rejects.toThrow('ECONNREFUSED');
  });

  it('quits the client on close', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, { logger: silentLogger });
    await store.close();
    expect(redis.quitCalls).toBe(1);
  });
});

describe('createCacheStore', () => {
  it('picks the store from the URL scheme', async () => {
    const memory = createCacheStore({ url: 'memory://', tlsVerify: true }, silentLogger);
    expect(memory.name).toBe('memory');

    const sqlite = createCacheStore({ url: 'sqlite::memory:', tlsVerify: true }, silentLogger);
    expect(sqlite.name).toBe('sqlite');
    await sqlite.close();

    const redis = createCacheStore({ url: 'redis://127.0.0.1:6399/0', tlsVerify: true }, silentLogger);
    expect(redis.name).toBe('redis');
    await redis.close();
  });

  it('rejects unsupported schemes', () => {
    expect(() => createCacheStore({ url: 'memcached://x', tlsVerify: true }, silentLogger)).toThrow(ConfigError);
    expect(() => createCacheStore({ url: 'sqlite:', tlsVerify: true }, silentLogger)).toThrow(ConfigError);
  });
});

describe('SingleFlight', () => {
  it('shares one call between concurrent callers of the same key', async () => {
    const flights = new SingleFlight<number>();
    let calls = 0;
    let release: (value: number) => void = () => {};
    const gate = new Promise<number>((resolve) => {
      release = resolve;
    });
    const fn = () => {
      calls++;
      return gate;
    };

    const first = flights.run('k', fn);
    const second = flights.run('k', fn);
    expect(flights.stats().inflight).toBe(1);
    release(42);

    expect(await first).toEqual({ value: 42, shared: false });
    expect(await second).toEqual({ value: 42, shared: true });
    expect(calls).toBe(1);
    expect(flights.stats().inflight).toBe(0);
  });

  it('does not reuse a failed call', async () => {
    const flights = new SingleFlight<number>();
    await expect(flights.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await flights.run('k', async () => 7)).toEqual({ value: 7, shared: false });
  });
});
