#!/usr/bin/env node

import { AuditLogger } from './audit/logger.js';
import { loadRuntimeConfig } from './config/runtime.js';
import { ServiceHttpClient } from './registry/client.js';
import { HeartbeatMonitor } from './registry/heartbeat.js';
import { DependencyNotifier } from './registry/notifier.js';
import { RegistryStore } from './registry/store.js';
import { startRegistryHttpServer } from './transports/http.js';
import { serviceVersion } from './version.js';

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const auditLogger = new AuditLogger({
    enabled: config.audit.enabled,
    filePath: config.audit.filePath,
    maxFileBytes: config.audit.maxFileBytes,
    maxFiles: config.audit.maxFiles,
    service: 'service-registry',
    serviceVersion
  });

  const client = new ServiceHttpClient({ timeoutMs: config.http.timeoutMs });
  const notifier = new DependencyNotifier({
    transport: client,
    maxConcurrency: config.notify.maxConcurrency,
    maxQueued: config.notify.maxQueued
  });
  const store = new RegistryStore({ notifier, auditLogger });
  const monitor = new HeartbeatMonitor({
    store,
    probe: client,
    config: {
      intervalMs: config.heartbeat.intervalMs,
      maxAttempts: config.heartbeat.maxAttempts,
      retryDelayMs: config.heartbeat.retryDelayMs,
      removalPolicy: config.heartbeat.removalPolicy
    },
    auditLogger
  });

  if (config.heartbeat.enabled) {
    monitor.start();
  }

  const serverHandle = await startRegistryHttpServer(config.http, {
    store,
    notifier,
    monitor
  });
  console.error(
    `[service-registry] listening at http://${config.http.host}:${serverHandle.port}${config.http.path}`
  );

  installShutdownHandlers(async () => {
    await serverHandle.stop();
    await monitor.stop();
    store.close();
    await notifier.close();
    await auditLogger.flush();
  });
}

function installShutdownHandlers(stop: () => Promise<void>): void {
  let shuttingDown = false;
  const shutdown = async (signal: 'SIGINT' | 'SIGTERM'): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.error(`[service-registry] ${signal} received, shutting down`);

    try {
      await stop();
    } catch (error) {
      console.error(`[service-registry] ${signal} shutdown error:`, error);
      process.exit(1);
      return;
    }

    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  console.error('[service-registry] fatal error:', error);
  process.exit(1);
});
