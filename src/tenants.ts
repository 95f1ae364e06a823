/**
 * Tenant Registry
 *
 * Holds the routing policy table as one immutable snapshot. Lookups never
 * suspend and never observe a partially-built table: a reload validates the
 * complete replacement first, then swaps the snapshot in one assignment.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, MissingTenantError, UnknownTenantError, formatError } from './errors.js';
import { type Logger, defaultLogger } from './logger.js';
import {
  BackendKindSchema,
  BackendKinds,
  DEFAULT_TENANT,
  FALLBACK_BACKEND,
  FALLBACK_LLM,
  LlmSourceSchema,
  type BackendKind,
  type TenantPolicy,
  type TenantTable,
} from './types.js';

// ============================================================================
// File schema
// ============================================================================

const UpstreamUrl = z.string().url().nullish();

const TenantEntrySchema = z
  .object({
    default_backend: BackendKindSchema.nullish(),
    default_llm: LlmSourceSchema.nullish(),
    upstreams: z
      .object({
        postgres_api: UpstreamUrl,
        oracle_api: UpstreamUrl,
        opensearch_api: UpstreamUrl,
      })
      .nullish(),
    auth: z
      .object({
        user: z.string().min(1),
        pass: z.string().min(1),
      })
      .nullish(),
  })
  .nullish();

const TenantFileSchema = z
  .object({
    default: TenantEntrySchema,
    tenants: z.record(z.string(), TenantEntrySchema).nullish(),
  })
  .nullish();

type TenantEntry = z.infer<typeof TenantEntrySchema>;

function toPolicy(tenantId: string, entry: TenantEntry): TenantPolicy {
  const ups = entry?.upstreams;
  const fromFile: Record<BackendKind, string | null | undefined> = {
    postgres: ups?.postgres_api,
    oracle: ups?.oracle_api,
    opensearch: ups?.opensearch_api,
  };
  const upstreams: Partial<Record<BackendKind, string>> = {};
  for (const kind of BackendKinds) {
    const url = fromFile[kind];
    if (url) upstreams[kind] = url;
  }

  const policy: TenantPolicy = {
    tenantId,
    defaultBackend: entry?.default_backend ?? FALLBACK_BACKEND,
    defaultLlm: entry?.default_llm ?? FALLBACK_LLM,
    upstreams: Object.freeze(upstreams),
  };
  if (entry?.auth) {
    policy.auth = Object.freeze({ username: entry.auth.user, password: entry.auth.pass });
  }
  return Object.freeze(policy);
}

/**
 * Validate a parsed tenant document and build a table from it.
 *
 * A top-level `default` block takes precedence over `tenants.default`.
 */
export function parseTenantDocument(doc: unknown): TenantTable {
  const result = TenantFileSchema.safeParse(doc);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid tenant config: ${issues}`);
  }

  const table = new Map<string, TenantPolicy>();
  for (const [id, entry] of Object.entries(result.data?.tenants ?? {})) {
    table.set(id, toPolicy(id, entry));
  }
  if (result.data?.default) {
    table.set(DEFAULT_TENANT, toPolicy(DEFAULT_TENANT, result.data.default));
  }
  return table;
}

/**
 * Read a tenant file (`.yaml`, `.yml` or `.json`).
 */
export function loadTenantFile(filePath: string): TenantTable {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read tenant config ${filePath}: ${formatError(err)}`);
  }

  let doc: unknown;
  try {
    doc = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(raw) : yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Cannot parse tenant config ${filePath}: ${formatError(err)}`);
  }
  return parseTenantDocument(doc);
}

// ============================================================================
// Registry
// ============================================================================

export interface TenantRegistryOptions {
  /** When false every lookup returns the `"default"` policy */
  tenancyEnabled: boolean;
  logger?: Logger;
}

export class TenantRegistry {
  private snapshot: TenantTable;
  readonly tenancyEnabled: boolean;
  private readonly logger: Logger;

  constructor(table: TenantTable, opts: TenantRegistryOptions) {
    this.tenancyEnabled = opts.tenancyEnabled;
    this.logger = opts.logger ?? defaultLogger;
    this.snapshot = this.check(table);
  }

  static fromFile(filePath: string, opts: TenantRegistryOptions): TenantRegistry {
    return new TenantRegistry(loadTenantFile(filePath), opts);
  }

  /**
   * Look up the policy for a request.
   */
  resolve(tenantId?: string | null): TenantPolicy {
    const table = this.snapshot;
    if (!this.tenancyEnabled) {
      const policy = table.get(DEFAULT_TENANT);
      // check() guarantees presence; a miss here means the invariant broke
      if (!policy) throw new ConfigError('No "default" tenant configured');
      return policy;
    }

    const id = tenantId?.trim();
    if (!id) throw new MissingTenantError();
    const policy = table.get(id);
    if (!policy) throw new UnknownTenantError(id);
    return policy;
  }

  /**
   * Replace the whole table. The previous snapshot stays active if the
   * replacement is rejected.
   */
  reload(table: TenantTable): void {
    this.snapshot = this.check(table);
    this.logger.info(`Tenant config reloaded (${table.size} entries)`);
  }

  /**
   * Reload from a file. Returns false (and keeps the current table) on error.
   */
  reloadFromFile(filePath: string): boolean {
    try {
      this.reload(loadTenantFile(filePath));
      return true;
    } catch (err) {
      this.logger.error(`Tenant config reload failed, keeping previous table: ${formatError(err)}`);
      return false;
    }
  }

  /**
   * Direct table lookup, ignoring the tenancy mode.
   */
  get(tenantId: string): TenantPolicy | undefined {
    return this.snapshot.get(tenantId);
  }

  tenantIds(): string[] {
    return [...this.snapshot.keys()];
  }

  get size(): number {
    return this.snapshot.size;
  }

  private check(table: TenantTable): TenantTable {
    if (!this.tenancyEnabled && !table.has(DEFAULT_TENANT)) {
      throw new ConfigError('Tenancy is disabled but no "default" tenant is configured');
    }
    if (this.tenancyEnabled && table.size === 0) {
      this.logger.warn('Tenancy is enabled but the tenant table is empty');
    }
    return new Map(table);
  }
}

/**
 * Watch a tenant file and reload the registry when it changes.
 */
export function watchTenantFile(
  filePath: string,
  registry: TenantRegistry,
  logger: Logger = defaultLogger,
): fs.FSWatcher {
  const dir = path.dirname(path.resolve(filePath));
  const base = path.basename(filePath);
  let debounceTimer: NodeJS.Timeout | null = null;

  const watcher = fs.watch(dir, (_eventType, filename) => {
    if (filename !== base) return;
    // Editors fire several events per save
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      logger.info('Tenant config changed, reloading...');
      registry.reloadFromFile(filePath);
    }, 100);
  });
  watcher.on('close', () => {
    if (debounceTimer) clearTimeout(debounceTimer);
  });
  return watcher;
}
