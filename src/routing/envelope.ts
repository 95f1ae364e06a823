/**
 * Request envelope.
 *
 * The inbound JSON body is split once into routing overrides, a private
 * control section (upstream credentials) and an opaque passthrough section.
 * Only the passthrough section is ever serialized toward an upstream.
 *
 * @packageDocumentation
 */

import { isLosslessNumber, parse, stringify } from 'lossless-json';
import { InvalidBackendError, InvalidLlmError, InvalidRequestError, type GatewayError } from '../errors.js';
import type { RouteOverrides } from '../types.js';
import { ENDPOINTS, type EndpointName } from './endpoints.js';

/** Body fields consumed by the router and stripped before forwarding. */
export const PRIVATE_FIELDS = ['_upstream_user', '_upstream_pass'] as const;

const PRIVATE_FIELD_SET: ReadonlySet<string> = new Set(PRIVATE_FIELDS);

/** Numbers inside are `LosslessNumber`s carrying their source text. */
export type PassthroughBody = Readonly<Record<string, unknown>>;

export interface RequestEnvelope {
  overrides: RouteOverrides;
  /** Body without the private fields, original key order */
  passthrough: PassthroughBody;
  /** Exact bytes to send upstream */
  forwardBody: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Read an optional string override. `null` and `""` count as absent.
 */
function readOverride(
  body: Record<string, unknown>,
  field: string,
  invalid: (value: unknown) => GatewayError = () => new InvalidRequestError(`${field} must be a string`, { field }),
): string | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') throw invalid(value);
  return value;
}

/**
 * Parse and split a raw request body.
 */
export function parseEnvelope(raw: string): RequestEnvelope {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch {
    throw new InvalidRequestError('Invalid JSON');
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  const body = parsed;

  const overrides: RouteOverrides = {};
  const backend = readOverride(body, 'backend', (v) => new InvalidBackendError(v));
  if (backend !== undefined) overrides.backend = backend;
  const llmSource = readOverride(body, 'llm_source', (v) => new InvalidLlmError(v));
  if (llmSource !== undefined) overrides.llmSource = llmSource;
  const model = readOverride(body, 'model');
  if (model !== undefined) overrides.model = model;
  const region = readOverride(body, 'region');
  if (region !== undefined) overrides.region = region;
  const upstreamUser = readOverride(body, '_upstream_user');
  if (upstreamUser !== undefined) overrides.upstreamUser = upstreamUser;
  const upstreamPass = readOverride(body, '_upstream_pass');
  if (upstreamPass !== undefined) overrides.upstreamPass = upstreamPass;

  const stripped = PRIVATE_FIELDS.some((field) => Object.hasOwn(body, field));
  const passthrough = Object.fromEntries(Object.entries(body).filter(([key]) => !PRIVATE_FIELD_SET.has(key)));

  let forwardBody = raw;
  if (stripped) {
    // Number literals are written back from their source text
    const serialized = stringify(passthrough);
    if (serialized === undefined) throw new InvalidRequestError('Request body could not be re-serialized');
    forwardBody = serialized;
  }

  return { overrides, passthrough: Object.freeze(passthrough), forwardBody };
}

/**
 * Check the fields an endpoint cannot work without.
 */
export function validateEndpointBody(endpoint: EndpointName, body: PassthroughBody): void {
  const result = ENDPOINTS[endpoint].schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new InvalidRequestError(`Invalid ${endpoint} request: ${issues.join('; ')}`, { endpoint });
  }
}
