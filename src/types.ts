/**
 * Edge Router Core Types
 *
 * Routing kinds, tenant policies and the per-request routing decision.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// Backend Kinds
// ============================================================================

/**
 * The interchangeable retrieval backends a request can be routed to.
 */
export const BackendKinds = ['postgres', 'oracle', 'opensearch'] as const;

export type BackendKind = (typeof BackendKinds)[number];

/**
 * Zod schema for backend kinds. Accepts any casing.
 */
export const BackendKindSchema = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(BackendKinds),
);

// ============================================================================
// LLM Providers
// ============================================================================

/**
 * Inference providers a generation request can be routed to.
 */
export const LlmSources = ['ollama', 'oci_genai', 'bedrock'] as const;

export type LlmSource = (typeof LlmSources)[number];

/**
 * Zod schema for LLM providers. Accepts any casing.
 */
export const LlmSourceSchema = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(LlmSources),
);

const BACKEND_SET: ReadonlySet<string> = new Set(BackendKinds);
const LLM_SET: ReadonlySet<string> = new Set(LlmSources);

export function isBackendKind(value: string): value is BackendKind {
  return BACKEND_SET.has(value);
}

export function isLlmSource(value: string): value is LlmSource {
  return LLM_SET.has(value);
}

/** Used when a tenant entry names no default backend. */
export const FALLBACK_BACKEND: BackendKind = 'opensearch';

/** Used when a tenant entry names no default LLM provider. */
export const FALLBACK_LLM: LlmSource = 'ollama';

/** Tenant key used when tenancy is disabled. */
export const DEFAULT_TENANT = 'default';

// ============================================================================
// Tenant Policy
// ============================================================================

/**
 * Basic-auth credentials sent to an upstream.
 */
export interface Credentials {
  username: string;
  password: string;
}

/**
 * Routing policy for one tenant. Instances held by the registry are frozen.
 */
export interface TenantPolicy {
  /**
   * Key the policy is stored under (`"default"` for the shared policy).
   */
  tenantId: string;

  /**
   * Backend used when the request does not name one.
   */
  defaultBackend: BackendKind;

  /**
   * LLM provider used when the request does not name one.
   */
  defaultLlm: LlmSource;

  /**
   * Base URL per backend. A missing entry fails resolution for that backend.
   */
  upstreams: Readonly<Partial<Record<BackendKind, string>>>;

  /**
   * Default upstream credentials.
   */
  auth?: Readonly<Credentials>;
}

/**
 * Immutable tenant table: one snapshot, swapped whole on reload.
 */
export type TenantTable = ReadonlyMap<string, TenantPolicy>;

// ============================================================================
// Overrides and Routing Decision
// ============================================================================

/**
 * Request-level routing fields. Values are kept raw here and validated by
 * the route resolver, so an invalid override fails instead of falling back.
 */
export interface RouteOverrides {
  backend?: string;
  llmSource?: string;
  model?: string;
  region?: string;
  /** From `_upstream_user`; never forwarded upstream. */
  upstreamUser?: string;
  /** From `_upstream_pass`; never forwarded upstream. */
  upstreamPass?: string;
}

/**
 * Concrete routing for one request. Request-local and never persisted.
 */
export interface RoutingDecision {
  readonly tenantId: string;
  readonly backend: BackendKind;
  readonly llmSource: LlmSource;
  readonly model?: string;
  readonly region?: string;
  readonly upstreamBase: string;
  readonly credentials?: Readonly<Credentials>;
}
