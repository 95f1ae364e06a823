/**
 * Routing module exports.
 *
 * @packageDocumentation
 */

export { resolveRoute, pickBackend, pickLlm, pickCredentials } from './resolver.js';
export { parseEnvelope, validateEndpointBody, PRIVATE_FIELDS } from './envelope.js';
export type { RequestEnvelope, PassthroughBody } from './envelope.js';
export {
  ENDPOINTS,
  EndpointNames,
  endpointForRoute,
  isEndpointName,
  isGenerationEndpoint,
} from './endpoints.js';
export type { EndpointName, EndpointKind, EndpointSpec } from './endpoints.js';
