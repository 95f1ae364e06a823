/**
 * Gateway pipeline
 *
 * tenant -> envelope -> route -> cache -> upstream, under the client-facing
 * deadline. Resolution failures are thrown before any cache or network
 * call; cache trouble degrades to a miss.
 *
 * @packageDocumentation
 */

import { SingleFlight, type ResponseCache } from './cache/index.js';
import { GatewayError, RequestTimeoutError, UpstreamError, formatError } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import { ENDPOINTS, isGenerationEndpoint, type EndpointName } from './routing/endpoints.js';
import { parseEnvelope, validateEndpointBody, type RequestEnvelope } from './routing/envelope.js';
import { resolveRoute } from './routing/resolver.js';
import type { CacheOutcome, StatsCollector } from './stats.js';
import type { TenantRegistry } from './tenants.js';
import type { RoutingDecision } from './types.js';
import type { ForwardOptions, ForwardResult } from './upstream.js';

/**
 * Anything that can carry a routed request upstream.
 */
export interface Forwarder {
  forward(decision: RoutingDecision, opts: ForwardOptions): Promise<ForwardResult>;
}

export interface GatewayRequest {
  endpoint: EndpointName;
  /** `X-Tenant-Id`, if sent */
  tenantId?: string | null;
  /** Raw JSON body */
  body: string;
  bypassCache?: boolean;
  requestId: string;
  /** Fires when the client goes away */
  signal?: AbortSignal;
}

export interface GatewayResponse {
  status: number;
  contentType: string;
  body: string;
  cache: CacheOutcome;
  decision: RoutingDecision;
}

export interface GatewayOptions {
  tenants: TenantRegistry;
  upstream: Forwarder;
  /** Omit to run without a cache */
  cache?: ResponseCache | null;
  stats?: StatsCollector;
  /** Client-facing deadline (default: 30000) */
  requestTimeoutMs?: number;
  /** Per upstream call (default: 30000) */
  upstreamTimeoutMs?: number;
  /** Share one upstream call between concurrent identical misses */
  collapseMisses?: boolean;
  logger?: Logger;
}

interface RequestContext {
  cache: CacheOutcome;
}

const DEADLINE: unique symbol = Symbol('deadline');

export class Gateway {
  readonly tenants: TenantRegistry;
  private readonly upstream: Forwarder;
  private readonly cache: ResponseCache | null;
  private readonly stats: StatsCollector | undefined;
  private readonly requestTimeoutMs: number;
  private readonly upstreamTimeoutMs: number;
  private readonly flights: SingleFlight<ForwardResult> | null;
  private readonly logger: Logger;

  constructor(opts: GatewayOptions) {
    this.tenants = opts.tenants;
    this.upstream = opts.upstream;
    this.cache = opts.cache ?? null;
    this.stats = opts.stats;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 30_000;
    this.upstreamTimeoutMs = opts.upstreamTimeoutMs ?? 30_000;
    this.flights = opts.collapseMisses ? new SingleFlight<ForwardResult>() : null;
    this.logger = opts.logger ?? defaultLogger;
  }

  /**
   * Serve one request. Throws {@link GatewayError} for anything the client
   * should see as an error; upstream 4xx answers are returned as-is.
   */
  async handle(req: GatewayRequest): Promise<GatewayResponse> {
    const started = Date.now();
    const ctx: RequestContext = { cache: this.cache ? 'MISS' : 'OFF' };

    const controller = new AbortController();
    const onClientAbort = () => controller.abort();
    if (req.signal?.aborted) controller.abort();
    else req.signal?.addEventListener('abort', onClientAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof DEADLINE>((resolve) => {
      timer = setTimeout(() => resolve(DEADLINE), this.requestTimeoutMs);
    });

    const work = this.run(req, controller.signal, ctx);
    try {
      const result = await Promise.race([work, deadline]);
      if (result === DEADLINE) {
        controller.abort();
        void work.catch((err: unknown) => {
          this.logger.debug(`[${req.requestId}] abandoned after deadline: ${formatError(err)}`);
        });
        throw new RequestTimeoutError(this.requestTimeoutMs);
      }
      this.record(req.endpoint, started, ctx.cache, result.status);
      return result;
    } catch (err) {
      this.record(req.endpoint, started, ctx.cache, err instanceof GatewayError ? err.statusCode : 500);
      throw err;
    } finally {
      clearTimeout(timer);
      req.signal?.removeEventListener('abort', onClientAbort);
    }
  }

  async close(): Promise<void> {
    await this.cache?.close();
  }

  private async run(req: GatewayRequest, signal: AbortSignal, ctx: RequestContext): Promise<GatewayResponse> {
    const policy = this.tenants.resolve(req.tenantId);
    const envelope = parseEnvelope(req.body);
    validateEndpointBody(req.endpoint, envelope.passthrough);
    const decision = resolveRoute(policy, envelope.overrides);

    const cache = this.cache && !req.bypassCache ? this.cache : null;
    if (this.cache && req.bypassCache) ctx.cache = 'BYPASS';

    if (cache) {
      const hit = await cache.lookup(req.endpoint, decision, envelope.passthrough);
      if (hit) {
        ctx.cache = 'HIT';
        this.logger.debug(`[${req.requestId}] cache hit ${req.endpoint} -> ${decision.backend}`);
        return { ...hit, cache: 'HIT', decision };
      }
    }

    let result: ForwardResult;
    if (cache && this.flights) {
      // The shared call outlives any single waiter, so it only carries the upstream timeout
      const key = cache.keyFor(req.endpoint, decision, envelope.passthrough);
      const flight = await this.flights.run(key, () => this.callUpstream(req, decision, envelope));
      result = flight.value;
    } else {
      result = await this.callUpstream(req, decision, envelope, signal);
    }

    if (result.ok) {
      if (cache) {
        await cache.store(req.endpoint, decision, envelope.passthrough, {
          status: result.status,
          contentType: result.contentType,
          body: result.body,
        });
      }
      return { status: result.status, contentType: result.contentType, body: result.body, cache: ctx.cache, decision };
    }

    switch (result.reason) {
      case 'upstream-status': {
        const status = result.status ?? 502;
        if (status >= 500) {
          throw new UpstreamError(502, 'upstream_error', `Upstream ${decision.backend} failed with ${status}`, {
            backend: decision.backend,
            upstream_status: status,
          });
        }
        return {
          status,
          contentType: result.contentType ?? 'application/json',
          body: result.body ?? '',
          cache: ctx.cache,
          decision,
        };
      }
      case 'connection':
        throw new UpstreamError(503, 'upstream_unavailable', `Upstream ${decision.backend} is unreachable`, {
          backend: decision.backend,
        });
      case 'timeout':
        throw new UpstreamError(504, 'upstream_timeout', `Upstream ${decision.backend} timed out`, {
          backend: decision.backend,
          timeout_ms: this.upstreamTimeoutMs,
        });
      case 'aborted':
        throw new GatewayError(499, 'client_closed_request', 'Client closed request');
    }
  }

  private callUpstream(
    req: GatewayRequest,
    decision: RoutingDecision,
    envelope: RequestEnvelope,
    signal?: AbortSignal,
  ): Promise<ForwardResult> {
    const headers: Record<string, string> = { 'x-request-id': req.requestId };
    if (isGenerationEndpoint(req.endpoint)) {
      headers['x-llm-source'] = decision.llmSource;
    }
    this.logger.debug(`[${req.requestId}] ${req.endpoint} -> ${decision.backend} (${decision.tenantId})`);
    return this.upstream.forward(decision, {
      method: 'POST',
      path: ENDPOINTS[req.endpoint].upstreamPath,
      headers,
      body: envelope.forwardBody,
      timeoutMs: this.upstreamTimeoutMs,
      ...(signal ? { signal } : {}),
    });
  }

  private record(endpoint: EndpointName, started: number, cache: CacheOutcome, status: number): void {
    this.stats?.recordRequest({
      timestamp: Date.now(),
      endpoint,
      latencyMs: Date.now() - started,
      cache,
      success: status < 400,
      status,
    });
  }
}
