/**
 * Stats Collector for the edge router.
 *
 * Tracks per-request metrics with a rolling 1-hour window.
 *
 * @packageDocumentation
 */

import type { EndpointName } from './routing/endpoints.js';

/** How the cache participated in a request. */
export type CacheOutcome = 'HIT' | 'MISS' | 'BYPASS' | 'OFF';

export interface RequestRecord {
  timestamp: number;
  endpoint: EndpointName;
  latencyMs: number;
  cache: CacheOutcome;
  success: boolean;
  /** Status returned to the client */
  status: number;
}

export interface EndpointStats {
  requests: number;
  failed: number;
}

export interface StatsSnapshot {
  windowMs: number;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cacheHits: number;
  cacheMisses: number;
  cacheBypassed: number;
  /** hits / (hits + misses); 0 with no cacheable traffic */
  cacheHitRate: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  byEndpoint: Partial<Record<EndpointName, EndpointStats>>;
  byStatus: Record<string, number>;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector {
  private requests: RequestRecord[] = [];
  private readonly now: () => number;

  constructor(opts: { now?: () => number } = {}) {
    this.now = opts.now ?? Date.now;
  }

  /** Record a completed request. */
  recordRequest(record: RequestRecord): void {
    this.requests.push(record);
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const reqs = this.requests;
    const failed = reqs.filter(r => !r.success).length;
    const hits = reqs.filter(r => r.cache === 'HIT').length;
    const misses = reqs.filter(r => r.cache === 'MISS').length;
    const bypassed = reqs.filter(r => r.cache === 'BYPASS').length;

    const latencies = reqs.map(r => r.latencyMs).sort((a, b) => a - b);

    const byEndpoint: Partial<Record<EndpointName, EndpointStats>> = {};
    const byStatus: Record<string, number> = {};
    for (const r of reqs) {
      const e = byEndpoint[r.endpoint] ?? { requests: 0, failed: 0 };
      e.requests++;
      if (!r.success) e.failed++;
      byEndpoint[r.endpoint] = e;
      byStatus[String(r.status)] = (byStatus[String(r.status)] ?? 0) + 1;
    }

    return {
      windowMs: ROLLING_WINDOW_MS,
      totalRequests: reqs.length,
      successfulRequests: reqs.length - failed,
      failedRequests: failed,
      cacheHits: hits,
      cacheMisses: misses,
      cacheBypassed: bypassed,
      cacheHitRate: hits + misses > 0 ? hits / (hits + misses) : 0,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
      byEndpoint,
      byStatus,
    };
  }

  reset(): void {
    this.requests = [];
  }

  private prune(): void {
    const cutoff = this.now() - ROLLING_WINDOW_MS;
    this.requests = this.requests.filter(r => r.timestamp >= cutoff);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
