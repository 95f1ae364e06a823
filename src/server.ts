/**
 * Edge Router HTTP Server
 *
 * Exposes the search and chat endpoints over node:http and hands each call
 * to the {@link Gateway}. Also serves `/health` and `/stats`.
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { nanoid } from 'nanoid';
import { GatewayError, PayloadTooLargeError, formatError } from './errors.js';
import type { Gateway } from './gateway.js';
import { handleHealthRequest, type HealthInfo } from './health.js';
import { defaultLogger, type Logger } from './logger.js';
import { endpointForRoute } from './routing/endpoints.js';
import type { StatsCollector } from './stats.js';

/**
 * Server configuration
 */
export interface GatewayServerConfig {
  gateway: Gateway;
  stats?: StatsCollector;
  port?: number;
  host?: string;
  cors?: { enabled: boolean; allowOrigins: string[] };
  /** Serve `/stats` (default: true) */
  metricsEnabled?: boolean;
  maxBodyBytes?: number;
  name?: string;
  version?: string;
  /** Cache backend name reported by `/health` */
  cacheName?: string;
  logger?: Logger;
}

/**
 * Error response format
 */
interface ErrorResponse {
  error: {
    message: string;
    type: 'gateway_error';
    code: string;
    request_id?: string;
    details?: Record<string, unknown>;
  };
}

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

const ALLOWED_HEADERS = 'Content-Type, Authorization, X-Tenant-Id, X-Cache-Bypass, X-Request-Id';
const EXPOSED_HEADERS = 'X-Cache, X-Routed-Backend, X-Request-Id';

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function isTruthyHeader(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export class GatewayServer {
  private server: http.Server | null = null;
  private readonly gateway: Gateway;
  private readonly stats: StatsCollector | undefined;
  private readonly logger: Logger;
  private readonly config: {
    port: number;
    host: string;
    cors: { enabled: boolean; allowOrigins: string[] };
    metricsEnabled: boolean;
    maxBodyBytes: number;
    name: string;
    version: string;
    cacheName: string;
  };

  constructor(config: GatewayServerConfig) {
    this.gateway = config.gateway;
    this.stats = config.stats;
    this.logger = config.logger ?? defaultLogger;
    this.config = {
      port: config.port ?? 8080,
      host: config.host ?? '127.0.0.1',
      cors: config.cors ?? { enabled: true, allowOrigins: ['*'] },
      metricsEnabled: config.metricsEnabled ?? true,
      maxBodyBytes: config.maxBodyBytes ?? 1024 * 1024,
      name: config.name ?? 'Edge Router',
      version: config.version ?? '0.0.0',
      cacheName: config.cacheName ?? 'off',
    };
  }

  /**
   * Start listening. Port 0 picks a free port; see {@link address}.
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          this.logger.error(`Unhandled error: ${formatError(err)}`);
          this.sendError(res, 500, 'internal_error', 'Internal server error');
        });
      });
      this.server = server;

      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        const { port } = this.address();
        this.logger.info(`${this.config.name} listening on http://${this.config.host}:${port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        const server = this.server;
        this.server = null;
        server.close(() => {
          this.logger.info('Server stopped');
          resolve();
        });
        server.closeIdleConnections();
      } else {
        resolve();
      }
    });
  }

  address(): { host: string; port: number } {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') {
      const info: AddressInfo = addr;
      return { host: info.address, port: info.port };
    }
    return { host: this.config.host, port: this.config.port };
  }

  /**
   * Handle incoming request
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const incomingId = firstHeader(req.headers['x-request-id']);
    const requestId = incomingId && REQUEST_ID_PATTERN.test(incomingId) ? incomingId : nanoid();
    res.setHeader('X-Request-Id', requestId);

    this.applyCors(req, res);

    // Handle preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (url.pathname === '/health' && req.method === 'GET') {
      const info: HealthInfo = {
        name: this.config.name,
        version: this.config.version,
        tenancyEnabled: this.gateway.tenants.tenancyEnabled,
        tenants: this.gateway.tenants.size,
        cache: this.config.cacheName,
      };
      handleHealthRequest(res, info);
      return;
    }

    if (url.pathname === '/stats' && req.method === 'GET' && this.config.metricsEnabled && this.stats) {
      this.sendJson(res, 200, this.stats.getStats());
      return;
    }

    const endpoint = endpointForRoute(url.pathname);
    if (!endpoint) {
      this.sendError(res, 404, 'not_found', `Unknown endpoint: ${url.pathname}`, requestId);
      return;
    }
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST, OPTIONS');
      this.sendError(res, 405, 'method_not_allowed', `${req.method ?? 'GET'} not allowed on ${url.pathname}`, requestId);
      return;
    }

    // Cancels the upstream call if the client disconnects first
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const started = Date.now();
    try {
      const body = await this.readBody(req);
      const result = await this.gateway.handle({
        endpoint,
        tenantId: firstHeader(req.headers['x-tenant-id']) ?? null,
        body,
        bypassCache: isTruthyHeader(firstHeader(req.headers['x-cache-bypass'])),
        requestId,
        signal: controller.signal,
      });
      res.writeHead(result.status, {
        'Content-Type': result.contentType,
        'Content-Length': Buffer.byteLength(result.body),
        'X-Cache': result.cache,
        'X-Routed-Backend': result.decision.backend,
      });
      res.end(result.body);
      this.logger.debug(
        `[${requestId}] ${endpoint} ${result.status} ${result.cache} ${result.decision.backend} ${Date.now() - started}ms`,
      );
    } catch (err) {
      if (err instanceof GatewayError) {
        this.logger.debug(`[${requestId}] ${endpoint} ${err.statusCode} ${err.code}: ${err.message}`);
        this.sendError(res, err.statusCode, err.code, err.message, requestId, err.details);
        return;
      }
      this.logger.error(`[${requestId}] ${endpoint} failed: ${formatError(err)}`);
      this.sendError(res, 500, 'internal_error', 'Internal server error', requestId);
    }
  }

  private applyCors(req: http.IncomingMessage, res: http.ServerResponse): void {
    const { enabled, allowOrigins } = this.config.cors;
    if (!enabled) return;
    const origin = firstHeader(req.headers.origin);
    if (allowOrigins.includes('*')) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else if (origin && allowOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    } else {
      return;
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
    res.setHeader('Access-Control-Expose-Headers', EXPOSED_HEADERS);
  }

  /**
   * Read the request body, enforcing the size limit.
   */
  private readBody(req: http.IncomingMessage): Promise<string> {
    const limit = this.config.maxBodyBytes;
    const declared = Number(firstHeader(req.headers['content-length']));
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      return Promise.reject(new PayloadTooLargeError(limit));
    }
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;
      req.on('data', (chunk: Buffer) => {
        if (tooLarge) return;
        size += chunk.length;
        if (size > limit) {
          tooLarge = true;
          chunks.length = 0;
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (tooLarge) reject(new PayloadTooLargeError(limit));
        else resolve(Buffer.concat(chunks).toString('utf8'));
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
    const body = JSON.stringify(payload);
    res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
    res.end(body);
  }

  /**
   * Send error response
   */
  private sendError(
    res: http.ServerResponse,
    status: number,
    code: string,
    message: string,
    requestId?: string,
    details?: Record<string, unknown>,
  ): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    const error: ErrorResponse = {
      error: {
        message,
        type: 'gateway_error',
        code,
        ...(requestId ? { request_id: requestId } : {}),
        ...(details ? { details } : {}),
      },
    };
    this.sendJson(res, status, error);
  }
}
