/**
 * Route Resolver
 *
 * Turns a tenant policy plus request overrides into a routing decision.
 * Pure: no I/O, no shared state.
 *
 * @packageDocumentation
 */

import {
  InvalidBackendError,
  InvalidLlmError,
  NoUpstreamConfiguredError,
  PartialCredentialsError,
} from '../errors.js';
import {
  isBackendKind,
  isLlmSource,
  type BackendKind,
  type Credentials,
  type LlmSource,
  type RouteOverrides,
  type RoutingDecision,
  type TenantPolicy,
} from '../types.js';

export function pickBackend(policy: TenantPolicy, override?: string): BackendKind {
  if (override === undefined) return policy.defaultBackend;
  const b = override.trim().toLowerCase();
  if (!isBackendKind(b)) throw new InvalidBackendError(override);
  return b;
}

export function pickLlm(policy: TenantPolicy, override?: string): LlmSource {
  if (override === undefined) return policy.defaultLlm;
  const s = override.trim().toLowerCase();
  if (!isLlmSource(s)) throw new InvalidLlmError(override);
  return s;
}

/**
 * Request credentials replace the tenant's only when both halves are given.
 * Exactly one half is rejected rather than mixed with the tenant default.
 */
export function pickCredentials(policy: TenantPolicy, overrides: RouteOverrides): Readonly<Credentials> | undefined {
  const { upstreamUser, upstreamPass } = overrides;
  if (upstreamUser !== undefined && upstreamPass !== undefined) {
    return Object.freeze({ username: upstreamUser, password: upstreamPass });
  }
  if (upstreamUser !== undefined) throw new PartialCredentialsError('_upstream_pass');
  if (upstreamPass !== undefined) throw new PartialCredentialsError('_upstream_user');
  return policy.auth;
}

export function resolveRoute(policy: TenantPolicy, overrides: RouteOverrides): RoutingDecision {
  const backend = pickBackend(policy, overrides.backend);
  const llmSource = pickLlm(policy, overrides.llmSource);

  const upstreamBase = policy.upstreams[backend];
  if (!upstreamBase) throw new NoUpstreamConfiguredError(backend, policy.tenantId);

  const credentials = pickCredentials(policy, overrides);

  return Object.freeze({
    tenantId: policy.tenantId,
    backend,
    llmSource,
    upstreamBase,
    ...(overrides.model !== undefined ? { model: overrides.model } : {}),
    ...(overrides.region !== undefined ? { region: overrides.region } : {}),
    ...(credentials ? { credentials } : {}),
  });
}
