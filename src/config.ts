/**
 * Configuration Management
 *
 * Reads router settings from the environment (and `.env`), validated with zod.
 * Tenant policies live in their own file; see `tenants.ts`.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Env booleans: `1/true/yes/on` and `0/false/no/off`, any casing.
 */
const envBool = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return fallback;
      const s = v.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(s)) return true;
      if (['0', 'false', 'no', 'off'].includes(s)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const envNumber = (fallback: number) =>
  z.preprocess(
    (v) => (v === undefined || v === '' ? fallback : v),
    z.coerce.number().positive(),
  );

const envString = (fallback: string) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : v), z.string());

/**
 * Environment schema. Timeouts and TTL are in seconds.
 */
const SettingsSchema = z.object({
  ROUTER_NAME: envString('Edge Router'),
  ROUTER_VERSION: envString('0.1.0'),
  HOST: envString('127.0.0.1'),
  PORT: z.preprocess((v) => (v === undefined || v === '' ? 8080 : v), z.coerce.number().int().min(0).max(65535)),
  REQUEST_TIMEOUT: envNumber(30),
  UPSTREAM_TIMEOUT: envNumber(30),
  TENANTS_CONFIG: envString('tenants.yaml'),
  TENANCY_ENABLE: envBool(false),
  CORS_ENABLE: envBool(true),
  CORS_ALLOW_ORIGINS: envString('*'),
  METRICS_ENABLE: envBool(true),
  CACHE_ENABLE: envBool(true),
  CACHE_TTL: envNumber(60),
  CACHE_URL: envString('redis://localhost:6379/0'),
  CACHE_TLS_VERIFY: envBool(true),
  CACHE_COLLAPSE_MISSES: envBool(false),
  MAX_BODY_BYTES: envNumber(1024 * 1024),
  VERBOSE: envBool(false),
});

/**
 * Resolved router settings.
 */
export interface Settings {
  routerName: string;
  routerVersion: string;
  host: string;
  port: number;
  /** Client-facing deadline per request */
  requestTimeoutMs: number;
  /** Deadline for a single upstream call */
  upstreamTimeoutMs: number;
  tenantsConfig: string;
  tenancyEnabled: boolean;
  cors: {
    enabled: boolean;
    allowOrigins: string[];
  };
  metricsEnabled: boolean;
  cache: {
    enabled: boolean;
    ttlSeconds: number;
    url: string;
    /** Verify TLS certificates for `rediss://`. Disabling is for non-production use only. */
    tlsVerify: boolean;
    collapseMisses: boolean;
  };
  maxBodyBytes: number;
  verbose: boolean;
}

/**
 * Parse settings from an env-like record.
 */
export function parseSettings(env: Record<string, string | undefined>): Settings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid settings: ${issues}`);
  }
  const s = result.data;
  return {
    routerName: s.ROUTER_NAME,
    routerVersion: s.ROUTER_VERSION,
    host: s.HOST,
    port: s.PORT,
    requestTimeoutMs: Math.round(s.REQUEST_TIMEOUT * 1000),
    upstreamTimeoutMs: Math.round(s.UPSTREAM_TIMEOUT * 1000),
    tenantsConfig: s.TENANTS_CONFIG,
    tenancyEnabled: s.TENANCY_ENABLE,
    cors: {
      enabled: s.CORS_ENABLE,
      allowOrigins: s.CORS_ALLOW_ORIGINS.split(',')
        .map((o) => o.trim())
        .filter((o) => o.length > 0),
    },
    metricsEnabled: s.METRICS_ENABLE,
    cache: {
      enabled: s.CACHE_ENABLE,
      ttlSeconds: Math.ceil(s.CACHE_TTL),
      url: s.CACHE_URL,
      tlsVerify: s.CACHE_TLS_VERIFY,
      collapseMisses: s.CACHE_COLLAPSE_MISSES,
    },
    maxBodyBytes: Math.round(s.MAX_BODY_BYTES),
    verbose: s.VERBOSE,
  };
}

/**
 * Load `.env` (if present) into `process.env`, then parse settings.
 */
export function loadSettings(envFile = path.resolve(process.cwd(), '.env')): Settings {
  loadDotenv({ path: envFile });
  return parseSettings(process.env);
}
