/**
 * Wires settings into a running edge router.
 *
 * @packageDocumentation
 */

import type { FSWatcher } from 'node:fs';
import {
  RedisCacheStore,
  ResponseCache,
  SqliteCacheStore,
  createCacheStore,
  type CacheStore,
} from './cache/index.js';
import type { Settings } from './config.js';
import { formatError } from './errors.js';
import { Gateway } from './gateway.js';
import { createLogger, type Logger } from './logger.js';
import { GatewayServer } from './server.js';
import { StatsCollector } from './stats.js';
import { TenantRegistry, watchTenantFile } from './tenants.js';
import { UpstreamProxy } from './upstream.js';

const SQLITE_PURGE_INTERVAL_MS = 60_000;

export interface EdgeRouterOptions {
  logger?: Logger;
  /** Reload tenants when the file changes (default: false) */
  watchTenants?: boolean;
  /** Use this store instead of the one named by the cache URL */
  cacheStore?: CacheStore;
}

export interface EdgeRouter {
  settings: Settings;
  tenants: TenantRegistry;
  gateway: Gateway;
  server: GatewayServer;
  stats: StatsCollector;
  cache: ResponseCache | null;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Re-read the tenant file; keeps the old table on failure */
  reloadTenants(): boolean;
}

/**
 * Build every component from settings. Nothing listens until `start()`.
 */
export function createEdgeRouter(settings: Settings, opts: EdgeRouterOptions = {}): EdgeRouter {
  const logger = opts.logger ?? createLogger({ verbose: settings.verbose });

  const tenants = TenantRegistry.fromFile(settings.tenantsConfig, {
    tenancyEnabled: settings.tenancyEnabled,
    logger,
  });

  const store = settings.cache.enabled ? (opts.cacheStore ?? createCacheStore(settings.cache, logger)) : null;
  const cache = store
    ? new ResponseCache({ store, ttlSeconds: settings.cache.ttlSeconds, logger })
    : null;

  const stats = new StatsCollector();
  const upstream = new UpstreamProxy({ logger });
  const gateway = new Gateway({
    tenants,
    upstream,
    cache,
    stats,
    requestTimeoutMs: settings.requestTimeoutMs,
    upstreamTimeoutMs: settings.upstreamTimeoutMs,
    collapseMisses: settings.cache.collapseMisses,
    logger,
  });
  const server = new GatewayServer({
    gateway,
    stats,
    port: settings.port,
    host: settings.host,
    cors: settings.cors,
    metricsEnabled: settings.metricsEnabled,
    maxBodyBytes: settings.maxBodyBytes,
    name: settings.routerName,
    version: settings.routerVersion,
    cacheName: store?.name ?? 'off',
    logger,
  });

  let watcher: FSWatcher | null = null;
  let purgeTimer: NodeJS.Timeout | null = null;

  return {
    settings,
    tenants,
    gateway,
    server,
    stats,
    cache,

    async start() {
      if (store instanceof RedisCacheStore) {
        // The router serves (uncached) while Redis is down
        void store.connect().then(
          () => logger.info('Cache connected (redis)'),
          (err: unknown) => logger.warn(`Cache unavailable, serving uncached: ${formatError(err)}`),
        );
      }
      if (store instanceof SqliteCacheStore) {
        purgeTimer = setInterval(() => {
          const removed = store.purgeExpired();
          if (removed > 0) logger.debug(`Purged ${removed} expired cache entries`);
        }, SQLITE_PURGE_INTERVAL_MS);
        purgeTimer.unref();
      }
      if (opts.watchTenants) {
        watcher = watchTenantFile(settings.tenantsConfig, tenants, logger);
      }
      await server.start();
      logger.info(
        `Tenancy ${settings.tenancyEnabled ? 'enabled' : 'disabled'} (${tenants.size} tenants), cache ${store?.name ?? 'off'}`,
      );
    },

    async stop() {
      watcher?.close();
      watcher = null;
      if (purgeTimer) clearInterval(purgeTimer);
      purgeTimer = null;
      await server.stop();
      await upstream.close();
      await gateway.close();
    },

    reloadTenants() {
      return tenants.reloadFromFile(settings.tenantsConfig);
    },
  };
}
