#!/usr/bin/env node
/**
 * Edge Router CLI
 *
 * Usage:
 *   edge-router [command] [options]
 *
 * Commands:
 *   (default), start       Start the gateway
 *   check                  Validate the tenant file and print the table
 *   health                 Probe a running gateway
 *
 * Settings come from the environment (and `.env`); flags override them.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { createEdgeRouter } from './app.js';
import { loadSettings, type Settings } from './config.js';
import { formatError } from './errors.js';
import { probeHealth } from './health.js';
import { createLogger } from './logger.js';
import { TenantRegistry } from './tenants.js';
import { BackendKinds } from './types.js';

function readVersion(): string {
  // src/cli.ts under a loader, dist/src/cli.js once built
  for (const rel of ['../package.json', '../../package.json']) {
    try {
      const raw = readFileSync(new URL(rel, import.meta.url), 'utf8');
      const pkg: unknown = JSON.parse(raw);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

const VERSION = readVersion();

interface CliOptions {
  port?: number;
  host?: string;
  tenants?: string;
  url?: string;
  verbose: boolean;
}

function parseOptions(args: string[]): CliOptions {
  const opts: CliOptions = { verbose: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--port' && next) {
      const port = parseInt(next, 10);
      if (isNaN(port) || port < 0 || port > 65535) {
        console.error('Error: Invalid port number');
        process.exit(1);
      }
      opts.port = port;
      i++;
    } else if (arg === '--host' && next) {
      opts.host = next;
      i++;
    } else if (arg === '--tenants' && next) {
      opts.tenants = next;
      i++;
    } else if (arg === '--url' && next) {
      opts.url = next;
      i++;
    } else if (arg === '-v' || arg === '--verbose') {
      opts.verbose = true;
    } else {
      console.error(`Error: Unknown option ${arg ?? ''}`);
      process.exit(1);
    }
  }
  return opts;
}

function applyOptions(settings: Settings, opts: CliOptions): Settings {
  return {
    ...settings,
    port: opts.port ?? settings.port,
    host: opts.host ?? settings.host,
    tenantsConfig: opts.tenants ?? settings.tenantsConfig,
    verbose: opts.verbose || settings.verbose,
  };
}

function printHelp(): void {
  console.log(`
Edge Router - multi-tenant gateway for search and chat backends

Usage:
  edge-router [command] [options]

Commands:
  (default), start       Start the gateway
  check                  Validate the tenant file and print the table
  health                 Probe a running gateway (exit 1 when unhealthy)

Options:
  --port <number>    Port to listen on (default: PORT or 8080)
  --host <string>    Host to bind to (default: HOST or 127.0.0.1)
  --tenants <path>   Tenant file (default: TENANTS_CONFIG or tenants.yaml)
  --url <url>        Gateway to probe with "health"
  -v, --verbose      Enable verbose logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  TENANCY_ENABLE     Require X-Tenant-Id and per-tenant policies (default: false)
  CACHE_ENABLE       Cache upstream responses (default: true)
  CACHE_URL          redis://, rediss://, sqlite:<path> or memory://
  CACHE_TTL          Cache TTL in seconds (default: 60)
  REQUEST_TIMEOUT    Client-facing deadline in seconds (default: 30)
  UPSTREAM_TIMEOUT   Upstream call deadline in seconds (default: 30)

Send SIGHUP to reload the tenant file.
`);
}

function printVersion(): void {
  console.log(`Edge Router v${VERSION}`);
}

function handleCheckCommand(settings: Settings): void {
  const registry = TenantRegistry.fromFile(settings.tenantsConfig, {
    tenancyEnabled: settings.tenancyEnabled,
    logger: createLogger({ verbose: settings.verbose }),
  });
  console.log('');
  console.log(`  Tenant file: ${settings.tenantsConfig}`);
  console.log(`  Tenancy:     ${registry.tenancyEnabled ? 'enabled' : 'disabled'}`);
  console.log('');
  for (const id of registry.tenantIds()) {
    const policy = registry.get(id);
    if (!policy) continue;
    const upstreams = BackendKinds.filter((k) => policy.upstreams[k]).join(', ') || 'none';
    console.log(`  ${id}`);
    console.log(`    backend: ${policy.defaultBackend}   llm: ${policy.defaultLlm}   auth: ${policy.auth ? 'yes' : 'no'}`);
    console.log(`    upstreams: ${upstreams}`);
  }
  console.log('');
  console.log(`  ✓ ${registry.size} tenant entries OK`);
}

async function handleHealthCommand(settings: Settings, url?: string): Promise<void> {
  const target = url ?? `http://${settings.host}:${settings.port}`;
  const healthy = await probeHealth(target);
  console.log(healthy ? `✓ ${target} is healthy` : `✗ ${target} is not responding`);
  process.exit(healthy ? 0 : 1);
}

async function handleStartCommand(settings: Settings): Promise<void> {
  const logger = createLogger({ verbose: settings.verbose });
  const router = createEdgeRouter(settings, { logger, watchTenants: true });

  console.log('');
  console.log(`  ${settings.routerName} v${settings.routerVersion}`);
  console.log(`  Tenants: ${settings.tenantsConfig}`);
  console.log(`  Cache:   ${settings.cache.enabled ? settings.cache.url : 'off'}`);
  console.log('');

  await router.start();

  process.on('SIGHUP', () => {
    logger.info('SIGHUP received, reloading tenants');
    router.reloadTenants();
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);
    router.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${formatError(err)}`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Check for help
  if (args.includes('-h') || args.includes('--help')) {
    printHelp();
    process.exit(0);
  }

  // Check for version
  if (args.includes('--version')) {
    printVersion();
    process.exit(0);
  }

  const first = args[0];
  const command = first && !first.startsWith('-') ? args.shift() : 'start';
  const opts = parseOptions(args);
  const settings = applyOptions(loadSettings(), opts);

  switch (command) {
    case 'start':
      await handleStartCommand(settings);
      return;
    case 'check':
      handleCheckCommand(settings);
      return;
    case 'health':
      await handleHealthCommand(settings, opts.url);
      return;
    default:
      console.error(`Error: Unknown command ${command ?? ''}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${formatError(err)}`);
  process.exit(1);
});
