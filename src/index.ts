/**
 * edge-router
 *
 * Multi-tenant gateway in front of interchangeable search backends and LLM
 * providers, with a shared response cache.
 *
 * @example
 * ```typescript
 * import { createEdgeRouter, parseSettings } from 'edge-router';
 *
 * const router = createEdgeRouter(parseSettings({ TENANTS_CONFIG: './tenants.yaml' }));
 * await router.start();
 * ```
 *
 * @packageDocumentation
 */

// Wiring
export { createEdgeRouter } from './app.js';
export type { EdgeRouter, EdgeRouterOptions } from './app.js';

// Configuration
export { loadSettings, parseSettings } from './config.js';
export type { Settings } from './config.js';

// Tenants
export { TenantRegistry, loadTenantFile, parseTenantDocument, watchTenantFile } from './tenants.js';
export type { TenantRegistryOptions } from './tenants.js';

// Routing
export * from './routing/index.js';

// Cache
export * from './cache/index.js';

// Upstream
export { UpstreamProxy, basicAuth, joinUrl } from './upstream.js';
export type {
  ForwardOptions,
  ForwardResult,
  ProxyError,
  ProxyErrorReason,
  UpstreamProxyOptions,
  UpstreamResponse,
} from './upstream.js';

// Gateway + server
export { Gateway } from './gateway.js';
export type { Forwarder, GatewayOptions, GatewayRequest, GatewayResponse } from './gateway.js';
export { GatewayServer } from './server.js';
export type { GatewayServerConfig } from './server.js';
export { handleHealthRequest, probeHealth } from './health.js';
export type { HealthInfo } from './health.js';
export { StatsCollector } from './stats.js';
export type { CacheOutcome, RequestRecord, StatsSnapshot } from './stats.js';

// Errors, logging, types
export * from './errors.js';
export { createLogger, defaultLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export * from './types.js';
