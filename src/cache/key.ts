/**
 * Cache key derivation.
 *
 * Keys are `edge:v1:<endpoint>:<backend>:<sha256>`. The digest covers a
 * stable encoding (sorted keys, no insignificant whitespace) of the
 * forwarded body and the routing scope, so two bodies that differ only in
 * key order or formatting share a key, and two backends never do. Numbers
 * keep their source text, so integers past 2^53 stay distinct.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import stableStringify from 'fast-json-stable-stringify';
import { isLosslessNumber, stringify } from 'lossless-json';
import { isGenerationEndpoint, type EndpointName } from '../routing/endpoints.js';
import type { PassthroughBody } from '../routing/envelope.js';
import type { RoutingDecision } from '../types.js';

export const CACHE_KEY_PREFIX = 'edge:v1';

export function sha256Hex(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value !== 'object' || value === null || isLosslessNumber(value)) return value;
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries.map(([k, v]) => [k, sortKeys(v)]));
}

/**
 * Canonical JSON for a request body.
 */
export function normalizeBody(body: PassthroughBody): string {
  return stringify(sortKeys(body)) ?? '{}';
}

export function buildCacheKey(endpoint: EndpointName, decision: RoutingDecision, body: PassthroughBody): string {
  const material: Record<string, unknown> = {
    // Tenants (and credential overrides) can see different data behind the same backend
    scope: {
      tenant: decision.tenantId,
      upstream: decision.upstreamBase,
      credentials: decision.credentials
        ? sha256Hex(stableStringify([decision.credentials.username, decision.credentials.password]))
        : null,
    },
    body: normalizeBody(body),
  };
  if (isGenerationEndpoint(endpoint)) {
    material['generation'] = {
      llm_source: decision.llmSource,
      model: decision.model ?? null,
      region: decision.region ?? null,
    };
  }
  return `${CACHE_KEY_PREFIX}:${endpoint}:${decision.backend}:${sha256Hex(stableStringify(material))}`;
}
