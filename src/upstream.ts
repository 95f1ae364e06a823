/**
 * Upstream Proxy
 *
 * Forwards a routed request to its backend over a shared keep-alive pool.
 * Never throws for network outcomes: every failure comes back as a
 * {@link ProxyError} for the gateway to map onto a client status.
 *
 * @packageDocumentation
 */

import { Agent, errors, request, type Dispatcher } from 'undici';
import { formatError } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import type { Credentials, RoutingDecision } from './types.js';

export interface ForwardOptions {
  method?: Dispatcher.HttpMethod;
  /** Appended to the decision's upstream base */
  path: string;
  headers?: Record<string, string>;
  body?: string;
  /** Upstream deadline for this call */
  timeoutMs: number;
  /** Caller cancellation; aborts the in-flight upstream call */
  signal?: AbortSignal;
}

export interface UpstreamResponse {
  ok: true;
  status: number;
  contentType: string;
  body: string;
  latencyMs: number;
}

export type ProxyErrorReason = 'timeout' | 'connection' | 'upstream-status' | 'aborted';

export interface ProxyError {
  ok: false;
  reason: ProxyErrorReason;
  message: string;
  /** Set for `upstream-status` */
  status?: number;
  contentType?: string;
  body?: string;
  latencyMs: number;
}

export type ForwardResult = UpstreamResponse | ProxyError;

export interface UpstreamProxyOptions {
  /** Max sockets per upstream origin (default: 64) */
  connections?: number;
  /** Idle keep-alive time (default: 30000) */
  keepAliveTimeoutMs?: number;
  logger?: Logger;
}

export function joinUrl(base: string, path: string): string {
  const trimmed = base.replace(/\/+$/, '');
  return path.startsWith('/') ? `${trimmed}${path}` : `${trimmed}/${path}`;
}

export function basicAuth(credentials: Credentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
  return `Basic ${token}`;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function isUndiciTimeout(err: unknown): boolean {
  return (
    err instanceof errors.HeadersTimeoutError ||
    err instanceof errors.BodyTimeoutError ||
    err instanceof errors.ConnectTimeoutError
  );
}

export class UpstreamProxy {
  private readonly agent: Agent;
  private readonly logger: Logger;

  constructor(opts: UpstreamProxyOptions = {}) {
    this.agent = new Agent({
      connections: opts.connections ?? 64,
      keepAliveTimeout: opts.keepAliveTimeoutMs ?? 30_000,
    });
    this.logger = opts.logger ?? defaultLogger;
  }

  async forward(decision: RoutingDecision, opts: ForwardOptions): Promise<ForwardResult> {
    const url = joinUrl(decision.upstreamBase, opts.path);
    const headers: Record<string, string> = {
      accept: 'application/json',
      'content-type': 'application/json',
      ...opts.headers,
    };
    if (decision.credentials) {
      headers['authorization'] = basicAuth(decision.credentials);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, opts.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (opts.signal?.aborted) {
      controller.abort();
    } else {
      opts.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const started = Date.now();
    try {
      const res = await request(url, {
        method: opts.method ?? 'POST',
        headers,
        body: opts.body,
        dispatcher: this.agent,
        signal: controller.signal,
      });
      const body = await res.body.text();
      const latencyMs = Date.now() - started;
      const contentType = headerValue(res.headers['content-type']) ?? 'application/json';

      if (res.statusCode < 200 || res.statusCode >= 300) {
        this.logger.debug(`Upstream ${url} answered ${res.statusCode} in ${latencyMs}ms`);
        return {
          ok: false,
          reason: 'upstream-status',
          message: `Upstream returned ${res.statusCode}`,
          status: res.statusCode,
          contentType,
          body,
          latencyMs,
        };
      }
      return { ok: true, status: res.statusCode, contentType, body, latencyMs };
    } catch (err) {
      const latencyMs = Date.now() - started;
      if (timedOut || isUndiciTimeout(err)) {
        this.logger.warn(`Upstream ${url} timed out after ${latencyMs}ms`);
        return { ok: false, reason: 'timeout', message: `Upstream timed out after ${opts.timeoutMs}ms`, latencyMs };
      }
      if (opts.signal?.aborted) {
        return { ok: false, reason: 'aborted', message: 'Request cancelled', latencyMs };
      }
      this.logger.warn(`Upstream ${url} unreachable: ${formatError(err)}`);
      return { ok: false, reason: 'connection', message: `Upstream unreachable: ${formatError(err)}`, latencyMs };
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
