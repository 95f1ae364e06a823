/**
 * Health endpoint handler + active health probe.
 * @packageDocumentation
 */

import * as http from 'node:http';
import { z } from 'zod';

const startTime = Date.now();

export interface HealthInfo {
  name: string;
  version: string;
  tenancyEnabled: boolean;
  tenants: number;
  cache: string;
}

/**
 * Handle GET /health on the gateway.
 * Returns { ok: true, uptime: <seconds>, ...info }.
 */
export function handleHealthRequest(res: http.ServerResponse, info: HealthInfo): void {
  const body = JSON.stringify({
    ok: true,
    name: info.name,
    version: info.version,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    tenancy: info.tenancyEnabled,
    tenants: info.tenants,
    cache: info.cache,
  });
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

const HealthBodySchema = z.object({ ok: z.literal(true) }).passthrough();

/**
 * Probe a gateway's /health endpoint.
 * Resolves true if healthy, false on any error/timeout.
 */
export function probeHealth(gatewayUrl: string, timeoutMs = 2000): Promise<boolean> {
  const url = new URL('/health', gatewayUrl);
  return new Promise((resolve) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      let data = '';
      res.on('data', (c: Buffer) => (data += c.toString('utf8')));
      res.on('end', () => {
        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch {
          resolve(false);
          return;
        }
        resolve(res.statusCode === 200 && HealthBodySchema.safeParse(json).success);
      });
    });
    req.on('error', () => resolve(false));
    req.on('timeout', () => {
      req.destroy();
      resolve(false);
    });
  });
}
