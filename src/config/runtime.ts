import { resolve } from 'node:path';
import { config as loadDotEnv } from 'dotenv';

import type { RemovalPolicy } from '../registry/heartbeat.js';

export interface RuntimeConfig {
  http: {
    host: string;
    port: number;
    path: string;
    maxRequestBytes: number;
    timeoutMs: number;
  };
  heartbeat: {
    enabled: boolean;
    intervalMs: number;
    maxAttempts: number;
    retryDelayMs: number;
    removalPolicy: RemovalPolicy;
  };
  notify: {
    maxConcurrency: number;
    maxQueued: number;
  };
  audit: {
    enabled: boolean;
    filePath: string;
    maxFileBytes: number;
    maxFiles: number;
  };
}

type ArgMap = Record<string, string>;

export function loadRuntimeConfig(argv = process.argv.slice(2), env = process.env): RuntimeConfig {
  loadDotEnv({ quiet: true });

  const args = parseArgs(argv);

  return {
    http: {
      host: args.host ?? env.REGISTRY_HOST ?? '127.0.0.1',
      port: parsePort(args.port ?? env.REGISTRY_PORT ?? env.PORT ?? '3000'),
      path: normalizePath(args.path ?? env.REGISTRY_PATH ?? '/services'),
      maxRequestBytes: parsePositiveInteger(
        args['max-request-bytes'] ?? env.REGISTRY_MAX_REQUEST_BYTES ?? '65536',
        'registry max request bytes',
        10_485_760
      ),
      timeoutMs: parsePositiveInteger(
        args['http-timeout-ms'] ?? env.REGISTRY_HTTP_TIMEOUT_MS ?? '5000',
        'registry outbound HTTP timeout ms',
        120_000
      )
    },
    heartbeat: {
      enabled: parseBoolean(
        args['heartbeat-enabled'] ?? env.REGISTRY_HEARTBEAT_ENABLED ?? 'true'
      ),
      intervalMs: parsePositiveInteger(
        args['heartbeat-interval-ms'] ?? env.REGISTRY_HEARTBEAT_INTERVAL_MS ?? '3000',
        'heartbeat interval ms',
        3_600_000
      ),
      maxAttempts: parsePositiveInteger(
        args['heartbeat-max-attempts'] ?? env.REGISTRY_HEARTBEAT_MAX_ATTEMPTS ?? '3',
        'heartbeat max attempts',
        20
      ),
      retryDelayMs: parseNonNegativeInteger(
        args['heartbeat-retry-delay-ms'] ?? env.REGISTRY_HEARTBEAT_RETRY_DELAY_MS ?? '1000',
        'heartbeat retry delay ms',
        60_000
      ),
      removalPolicy: parseRemovalPolicy(
        args['heartbeat-removal'] ?? env.REGISTRY_HEARTBEAT_REMOVAL ?? 'eager'
      )
    },
    notify: {
      maxConcurrency: parsePositiveInteger(
        args['notify-max-concurrency'] ?? env.REGISTRY_NOTIFY_MAX_CONCURRENCY ?? '16',
        'notify max concurrency',
        1_024
      ),
      maxQueued: parseNonNegativeInteger(
        args['notify-max-queued'] ?? env.REGISTRY_NOTIFY_MAX_QUEUED ?? '1024',
        'notify max queued',
        1_000_000
      )
    },
    audit: {
      enabled: parseBoolean(args['audit-enabled'] ?? env.REGISTRY_AUDIT_ENABLED ?? 'false'),
      filePath: resolve(
        args['audit-file'] ?? env.REGISTRY_AUDIT_FILE ?? '.service-registry/audit.log'
      ),
      maxFileBytes: parsePositiveInteger(
        args['audit-max-file-bytes'] ?? env.REGISTRY_AUDIT_MAX_FILE_BYTES ?? '10000000',
        'audit max file bytes',
        1_000_000_000
      ),
      maxFiles: parsePositiveInteger(
        args['audit-max-files'] ?? env.REGISTRY_AUDIT_MAX_FILES ?? '5',
        'audit max files',
        100
      )
    }
  };
}

function parseArgs(argv: string[]): ArgMap {
  const args: ArgMap = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token || !token.startsWith('--')) {
      continue;
    }

    const withoutPrefix = token.slice(2);
    const eqIndex = withoutPrefix.indexOf('=');
    if (eqIndex > -1) {
      const key = withoutPrefix.slice(0, eqIndex);
      const value = withoutPrefix.slice(eqIndex + 1);
      if (key.length > 0 && value.length > 0) {
        args[key] = value;
      }
      continue;
    }

    const maybeValue = argv[i + 1];
    if (maybeValue && !maybeValue.startsWith('--')) {
      args[withoutPrefix] = maybeValue;
      i += 1;
      continue;
    }

    args[withoutPrefix] = 'true';
  }

  return args;
}

function parsePort(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    throw new Error(`Invalid registry port "${value}". Expected an integer between 1 and 65535.`);
  }

  return parsed;
}

function normalizePath(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error('Registry path must not be empty.');
  }

  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function parseRemovalPolicy(value: string): RemovalPolicy {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'eager' || normalized === 'exhausted') {
    return normalized;
  }

  throw new Error(`Invalid heartbeat removal policy "${value}". Expected "eager" or "exhausted".`);
}

function parsePositiveInteger(value: string, label: string, max: number): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new Error(`Invalid ${label} "${value}". Expected 1-${max}.`);
  }

  return parsed;
}

function parseNonNegativeInteger(value: string, label: string, max: number): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > max) {
    throw new Error(`Invalid ${label} "${value}". Expected 0-${max}.`);
  }

  return parsed;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  throw new Error(`Invalid boolean value "${value}".`);
}
