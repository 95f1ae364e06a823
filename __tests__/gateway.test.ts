import { describe, it, expect, beforeEach } from 'vitest';
import { Gateway, type Forwarder } from '../src/gateway.js';
import { MemoryCacheStore, ResponseCache, type CacheEntry, type CacheStore } from '../src/cache/index.js';
import {
  GatewayError,
  InvalidRequestError,
  MissingTenantError,
  RequestTimeoutError,
  UpstreamError,
} from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { StatsCollector } from '../src/stats.js';
import { TenantRegistry, parseTenantDocument } from '../src/tenants.js';
import type { RoutingDecision } from '../src/types.js';
import type { ForwardOptions, ForwardResult } from '../src/upstream.js';

const table = parseTenantDocument({
  default: {
    default_backend: 'opensearch',
    default_llm: 'ollama',
    upstreams: {
      postgres_api: 'http://pg.local:9001',
      oracle_api: 'http://ora.local:9002',
      opensearch_api: 'http://os.local:9003',
    },
  },
  tenants: {
    tenantA: {
      default_backend: 'postgres',
      default_llm: 'bedrock',
      upstreams: { postgres_api: 'http://pg-a.local:9001' },
      auth: { user: 'svc-a', pass: 'test-secret' },
    },
  },
});

function ok(body: string, status = 200): ForwardResult {
  return { ok: true, status, contentType: 'application/json', body, latencyMs: 1 };
}

class FakeUpstream implements Forwarder {
  calls: Array<{ decision: RoutingDecision; opts: ForwardOptions }> = [];
  handler: (decision: RoutingDecision, opts: ForwardOptions) => Promise<ForwardResult> = async () =>
    ok('{"hits":[]}');

  forward(decision: RoutingDecision, opts: ForwardOptions): Promise<ForwardResult> {
    this.calls.push({ decision, opts });
    return this.handler(decision, opts);
  }
}

class BrokenStore implements CacheStore {
  readonly name = 'broken';
  async get(): Promise<CacheEntry | null> {
    throw new Error('connection refused');
  }
  async set(): Promise<void> {
    throw new Error('connection refused');
  }
  async close(): Promise<void> {}
}

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected a rejection');
}

describe('Gateway', () => {
  let upstream: FakeUpstream;
  let stats: StatsCollector;

  function gateway(opts: { tenancyEnabled?: boolean; cache?: ResponseCache | null; collapseMisses?: boolean; requestTimeoutMs?: number } = {}) {
    const tenants = new TenantRegistry(table, { tenancyEnabled: opts.tenancyEnabled ?? false, logger: silentLogger });
    const cache =
      opts.cache === undefined
        ? new ResponseCache({ store: new MemoryCacheStore(), logger: silentLogger })
        : opts.cache;
    return new Gateway({
      tenants,
      upstream,
      cache,
      stats,
      requestTimeoutMs: opts.requestTimeoutMs ?? 2000,
      upstreamTimeoutMs: 1000,
      collapseMisses: opts.collapseMisses ?? false,
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    upstream = new FakeUpstream();
    stats = new StatsCollector();
  });

  describe('routing', () => {
    it('sends a plain request to the default backend when tenancy is disabled', async () => {
      const res = await gateway().handle({
        endpoint: 'vector',
        body: '{"query":"x","top_k":5}',
        requestId: 'r1',
      });

      expect(res.status).toBe(200);
      expect(res.body).toBe('{"hits":[]}');
      expect(res.cache).toBe('MISS');
      expect(res.decision.backend).toBe('opensearch');
      expect(upstream.calls).toHaveLength(1);
      expect(upstream.calls[0]?.decision.upstreamBase).toBe('http://os.local:9003');
      expect(upstream.calls[0]?.opts.path).toBe('/search/vector');
      expect(upstream.calls[0]?.opts.body).toBe('{"query":"x","top_k":5}');
      expect(upstream.calls[0]?.opts.timeoutMs).toBe(1000);
      expect(upstream.calls[0]?.opts.headers).toEqual({ 'x-request-id': 'r1' });
    });

    it('honours a backend override from the default policy', async () => {
      const res = await gateway().handle({
        endpoint: 'vector',
        body: '{"query":"x","top_k":5,"backend":"oracle"}',
        requestId: 'r2',
      });
      expect(res.decision.backend).toBe('oracle');
      expect(upstream.calls[0]?.decision.upstreamBase).toBe('http://ora.local:9002');
    });

    it('rejects a missing tenant before any upstream call', async () => {
      const err = await caught(gateway({ tenancyEnabled: true }).handle({
        endpoint: 'vector',
        body: '{"query":"x"}',
        requestId: 'r3',
      }));
      expect(err).toBeInstanceOf(MissingTenantError);
      expect(upstream.calls).toHaveLength(0);
      expect(stats.getStats().byStatus).toEqual({ '401': 1 });
    });

    it('routes by tenant when tenancy is enabled', async () => {
      const res = await gateway({ tenancyEnabled: true }).handle({
        endpoint: 'rag',
        tenantId: 'tenantA',
        body: '{"question":"why"}',
        requestId: 'r4',
      });
      expect(res.decision.backend).toBe('postgres');
      expect(upstream.calls[0]?.decision.credentials).toEqual({ username: 'svc-a', password: 'test-secret' });
      expect(upstream.calls[0]?.opts.path).toBe('/search/rag');
      expect(upstream.calls[0]?.opts.headers).toEqual({ 'x-request-id': 'r4', 'x-llm-source': 'bedrock' });
    });

    it('strips credential overrides and routes with them', async () => {
      await gateway().handle({
        endpoint: 'conversation',
        body: '{"message":"hi","_upstream_user":"a","_upstream_pass":"b"}',
        requestId: 'r5',
      });
      expect(upstream.calls[0]?.opts.body).toBe('{"message":"hi"}');
      expect(upstream.calls[0]?.decision.credentials).toEqual({ username: 'a', password: 'b' });
    });

    it('validates the endpoint body before forwarding', async () => {
      const err = await caught(gateway().handle({ endpoint: 'fts', body: '{"top_k":5}', requestId: 'r6' }));
      expect(err).toBeInstanceOf(InvalidRequestError);
      expect(upstream.calls).toHaveLength(0);
    });
  });

  describe('caching', () => {
    it('serves a repeated request from cache', async () => {
      const gw = gateway();
      await gw.handle({ endpoint: 'hybrid', body: '{"query":"x","top_k":5}', requestId: 'a' });
      const second = await gw.handle({ endpoint: 'hybrid', body: '{ "top_k": 5, "query": "x" }', requestId: 'b' });

      expect(second.cache).toBe('HIT');
      expect(second.body).toBe('{"hits":[]}');
      expect(upstream.calls).toHaveLength(1);
      expect(stats.getStats()).toMatchObject({ cacheHits: 1, cacheMisses: 1, cacheHitRate: 0.5 });
    });

    it('does not serve a cached answer to a different password', async () => {
      const gw = gateway();
      const right = '{"query":"x","_upstream_user":"alice","_upstream_pass":"test-secret"}';
      const wrong = '{"query":"x","_upstream_user":"alice","_upstream_pass":"wrong-secret"}';
      await gw.handle({ endpoint: 'fts', body: right, requestId: 'a' });
      const second = await gw.handle({ endpoint: 'fts', body: wrong, requestId: 'b' });
      expect(second.cache).toBe('MISS');
      expect(upstream.calls).toHaveLength(2);
      expect(upstream.calls[1]?.decision.credentials).toEqual({ username: 'alice', password: 'wrong-secret' });
    });

    it('skips the cache on bypass', async () => {
      const gw = gateway();
      const first = await gw.handle({ endpoint: 'fts', body: '{"query":"x"}', bypassCache: true, requestId: 'a' });
      const second = await gw.handle({ endpoint: 'fts', body: '{"query":"x"}', requestId: 'b' });
      expect(first.cache).toBe('BYPASS');
      expect(second.cache).toBe('MISS');
      expect(upstream.calls).toHaveLength(2);
    });

    it('reports OFF without a cache', async () => {
      const res = await gateway({ cache: null }).handle({ endpoint: 'fts', body: '{"query":"x"}', requestId: 'a' });
      expect(res.cache).toBe('OFF');
    });

    it('proceeds as a miss when the cache store is unreachable', async () => {
      const cache = new ResponseCache({ store: new BrokenStore(), logger: silentLogger });
      const res = await gateway({ cache }).handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'a' });
      expect(res.status).toBe(200);
      expect(res.cache).toBe('MISS');
      expect(upstream.calls).toHaveLength(1);
    });

    it('does not cache non-2xx answers', async () => {
      upstream.handler = async () => ({
        ok: false,
        reason: 'upstream-status',
        status: 404,
        contentType: 'application/json',
        body: '{"detail":"no index"}',
        message: 'Upstream returned 404',
        latencyMs: 1,
      });
      const gw = gateway();
      const res = await gw.handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'a' });
      expect(res.status).toBe(404);
      expect(res.body).toBe('{"detail":"no index"}');

      await gw.handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'b' });
      expect(upstream.calls).toHaveLength(2);
    });

    it('collapses concurrent identical misses when enabled', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      upstream.handler = async () => {
        await gate;
        return ok('{"hits":[9]}');
      };
      const gw = gateway({ collapseMisses: true });
      const a = gw.handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'a' });
      const b = gw.handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'b' });
      await new Promise((resolve) => setTimeout(resolve, 20));
      release();

      const [ra, rb] = await Promise.all([a, b]);
      expect(ra.body).toBe('{"hits":[9]}');
      expect(rb.body).toBe('{"hits":[9]}');
      expect(upstream.calls).toHaveLength(1);
    });
  });

  describe('upstream failures', () => {
    function failing(result: ForwardResult) {
      upstream.handler = async () => result;
      return gateway().handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'f' });
    }

    it('maps upstream 5xx to 502', async () => {
      const err = await caught(
        failing({ ok: false, reason: 'upstream-status', status: 503, body: 'down', message: 'x', latencyMs: 1 }),
      );
      expect(err).toBeInstanceOf(UpstreamError);
      expect(err).toMatchObject({ statusCode: 502, code: 'upstream_error' });
    });

    it('maps connection failures to 503', async () => {
      const err = await caught(failing({ ok: false, reason: 'connection', message: 'refused', latencyMs: 1 }));
      expect(err).toMatchObject({ statusCode: 503, code: 'upstream_unavailable' });
    });

    it('maps upstream timeouts to 504', async () => {
      const err = await caught(failing({ ok: false, reason: 'timeout', message: 'slow', latencyMs: 1 }));
      expect(err).toMatchObject({ statusCode: 504, code: 'upstream_timeout' });
    });

    it('enforces the client deadline and aborts the upstream call', async () => {
      let upstreamSignal: AbortSignal | undefined;
      upstream.handler = (_decision, opts) => {
        upstreamSignal = opts.signal;
        return new Promise((resolve) => {
          opts.signal?.addEventListener('abort', () =>
            resolve({ ok: false, reason: 'aborted', message: 'cancelled', latencyMs: 1 }),
          );
        });
      };
      const gw = gateway({ requestTimeoutMs: 30 });
      const err = await caught(gw.handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'd' }));

      expect(err).toBeInstanceOf(RequestTimeoutError);
      expect(err).toMatchObject({ statusCode: 504, code: 'request_timeout' });
      expect(upstreamSignal?.aborted).toBe(true);
    });

    it('reports a client that went away', async () => {
      const controller = new AbortController();
      controller.abort();
      upstream.handler = async () => ({ ok: false, reason: 'aborted', message: 'cancelled', latencyMs: 0 });
      const err = await caught(
        gateway().handle({ endpoint: 'vector', body: '{"query":"x"}', requestId: 'c', signal: controller.signal }),
      );
      expect(err).toBeInstanceOf(GatewayError);
      expect(err).toMatchObject({ statusCode: 499 });
    });
  });
});
