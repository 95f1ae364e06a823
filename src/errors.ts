/**
 * Gateway error taxonomy.
 *
 * Every failure the router reports to a client is a {@link GatewayError}
 * carrying the HTTP status and a stable machine-readable code.
 *
 * @packageDocumentation
 */

export class GatewayError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(statusCode: number, code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GatewayError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// ============================================================================
// Tenant resolution
// ============================================================================

export class MissingTenantError extends GatewayError {
  constructor() {
    super(401, 'missing_tenant', 'Missing X-Tenant-Id');
    this.name = 'MissingTenantError';
  }
}

export class UnknownTenantError extends GatewayError {
  constructor(tenantId: string) {
    super(401, 'unknown_tenant', `Unknown tenant: ${tenantId}`, { tenant_id: tenantId });
    this.name = 'UnknownTenantError';
  }
}

// ============================================================================
// Route resolution
// ============================================================================

export class InvalidBackendError extends GatewayError {
  constructor(value: unknown) {
    super(400, 'invalid_backend', 'Invalid backend', { backend: value });
    this.name = 'InvalidBackendError';
  }
}

export class InvalidLlmError extends GatewayError {
  constructor(value: unknown) {
    super(400, 'invalid_llm_source', 'Invalid llm_source', { llm_source: value });
    this.name = 'InvalidLlmError';
  }
}

export class NoUpstreamConfiguredError extends GatewayError {
  constructor(backend: string, tenantId: string) {
    super(400, 'no_upstream_configured', `Upstream not configured for backend ${backend}`, {
      backend,
      tenant_id: tenantId,
    });
    this.name = 'NoUpstreamConfiguredError';
  }
}

export class PartialCredentialsError extends GatewayError {
  constructor(missing: '_upstream_user' | '_upstream_pass') {
    super(400, 'partial_credentials', `${missing} is required when overriding upstream credentials`, {
      missing,
    });
    this.name = 'PartialCredentialsError';
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'invalid_request', message, details);
    this.name = 'InvalidRequestError';
  }
}

export class PayloadTooLargeError extends GatewayError {
  constructor(limitBytes: number) {
    super(413, 'payload_too_large', `Request body exceeds ${limitBytes} bytes`, { limit_bytes: limitBytes });
    this.name = 'PayloadTooLargeError';
  }
}

// ============================================================================
// Upstream / deadline
// ============================================================================

export class UpstreamError extends GatewayError {
  constructor(statusCode: number, code: string, message: string, details?: Record<string, unknown>) {
    super(statusCode, code, message, details);
    this.name = 'UpstreamError';
  }
}

export class RequestTimeoutError extends GatewayError {
  constructor(timeoutMs: number) {
    super(504, 'request_timeout', `Request exceeded ${timeoutMs}ms`, { timeout_ms: timeoutMs });
    this.name = 'RequestTimeoutError';
  }
}

// ============================================================================
// Startup / configuration
// ============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Best-effort message extraction for logs.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
