/**
 * Logical endpoints the router exposes, and where each one lands upstream.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * `search` endpoints are idempotent reads; `generation` endpoints produce
 * model output and key their cache entries on provider and model too.
 */
export type EndpointKind = 'search' | 'generation';

export interface EndpointSpec {
  /** Inbound route */
  route: string;
  /** Path appended to the upstream base URL */
  upstreamPath: string;
  kind: EndpointKind;
  /** Minimal body check; every other field passes through */
  schema: z.ZodTypeAny;
}

const text = z.string().trim().min(1);

const SearchBody = z.object({ query: text }).passthrough();
const RagBody = z.object({ question: text }).passthrough();
const ChatBody = z.object({ message: text }).passthrough();

export const ENDPOINTS = {
  vector: { route: '/v1/search/vector', upstreamPath: '/search/vector', kind: 'search', schema: SearchBody },
  hybrid: { route: '/v1/search/hybrid', upstreamPath: '/search/hybrid', kind: 'search', schema: SearchBody },
  fts: { route: '/v1/search/fts', upstreamPath: '/search/fts', kind: 'search', schema: SearchBody },
  rag: { route: '/v1/search/rag', upstreamPath: '/search/rag', kind: 'generation', schema: RagBody },
  conversation: {
    route: '/v1/chat/conversation',
    upstreamPath: '/chat/conversation',
    kind: 'generation',
    schema: ChatBody,
  },
  agentic: { route: '/v1/chat/agentic', upstreamPath: '/chat/agentic', kind: 'generation', schema: ChatBody },
} as const satisfies Record<string, EndpointSpec>;

export type EndpointName = keyof typeof ENDPOINTS;

export const EndpointNames = Object.keys(ENDPOINTS).filter(isEndpointName);

export function isEndpointName(value: string): value is EndpointName {
  return Object.prototype.hasOwnProperty.call(ENDPOINTS, value);
}

/**
 * Find the endpoint served at an inbound route.
 */
export function endpointForRoute(pathname: string): EndpointName | null {
  const trimmed = pathname.length > 1 ? pathname.replace(/\/+$/, '') : pathname;
  for (const name of EndpointNames) {
    if (ENDPOINTS[name].route === trimmed) return name;
  }
  return null;
}

export function isGenerationEndpoint(endpoint: EndpointName): boolean {
  return ENDPOINTS[endpoint].kind === 'generation';
}
