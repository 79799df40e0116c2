import { randomUUID } from 'node:crypto';
import type { Server as HttpServer } from 'node:http';

import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import { RegistryError, ValidationError, describeError } from '../errors.js';
import type { HeartbeatMonitor } from '../registry/heartbeat.js';
import { parseRegistration } from '../registry/model.js';
import type { DependencyNotifier } from '../registry/notifier.js';
import type { RegistryStore } from '../registry/store.js';

export interface HttpTransportConfig {
  host: string;
  port: number;
  path: string;
  maxRequestBytes: number;
}

export interface RegistryHttpDependencies {
  store: RegistryStore;
  notifier: DependencyNotifier;
  monitor?: HeartbeatMonitor;
}

export interface HttpServerHandle {
  port: number;
  stop: () => Promise<void>;
}

export function createRegistryApp(
  config: Pick<HttpTransportConfig, 'path' | 'maxRequestBytes'>,
  deps: RegistryHttpDependencies
): Express {
  const startedAt = Date.now();
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    resolveRequestId(req, res);
    next();
  });

  app.use(
    config.path,
    express.text({ type: () => true, limit: config.maxRequestBytes })
  );

  app
    .route(config.path)
    .post(async (req, res) => {
      console.error(`[registry-http] POST ${config.path} received`);
      try {
        const registration = parseRegistration(parseJsonBody(req.body));
        await deps.store.add(registration);
        res.status(200).end();
      } catch (error) {
        sendError(res, 400, error);
      }
    })
    .delete(async (req, res) => {
      const url = typeof req.body === 'string' ? req.body : '';
      console.error(`[registry-http] DELETE ${config.path} for service url ${url}`);
      try {
        await deps.store.remove(url);
        res.status(200).end();
      } catch (error) {
        sendError(res, 500, error);
      }
    })
    .all((_req, res) => {
      res.setHeader('Allow', 'POST, DELETE');
      res.status(405).end();
    });

  app.get('/livez', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', (_req, res) => {
    const notifierStats = deps.notifier.stats();
    const heartbeatStats = deps.monitor?.stats();
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.status(200).send(
      formatPrometheusMetrics({
        processUptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
        registrations: deps.store.size(),
        patchesSentTotal: notifierStats.sent,
        patchesFailedTotal: notifierStats.failed,
        patchesDroppedTotal: notifierStats.pool.dropped,
        heartbeatWavesTotal: heartbeatStats?.waves ?? 0,
        heartbeatFailuresTotal: heartbeatStats?.probeFailures ?? 0,
        heartbeatRemovalsTotal: heartbeatStats?.removals ?? 0
      })
    );
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendError(res, req.method === 'POST' ? 400 : 500, error);
  });

  return app;
}

export async function startRegistryHttpServer(
  config: HttpTransportConfig,
  deps: RegistryHttpDependencies
): Promise<HttpServerHandle> {
  const app = createRegistryApp(config, deps);
  const httpServer = await listen(app, config.host, config.port);
  const address = httpServer.address();
  if (address === null || typeof address === 'string') {
    await closeServer(httpServer);
    throw new Error(`Registry server did not bind a TCP port (address: ${String(address)}).`);
  }

  return {
    port: address.port,
    stop: () => closeServer(httpServer)
  };
}

function parseJsonBody(body: unknown): unknown {
  if (typeof body !== 'string' || body.trim().length === 0) {
    throw new ValidationError('Request body must be a JSON registration.');
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ValidationError(`Malformed JSON body: ${describeError(error)}`);
  }
}

function sendError(res: Response, statusCode: number, error: unknown): void {
  console.error('[registry-http] request failed:', {
    requestId: res.getHeader('x-request-id') ?? null,
    error: describeError(error)
  });

  if (res.headersSent) {
    return;
  }

  res.status(statusCode).json({
    error: {
      kind: error instanceof RegistryError ? error.kind : 'internal',
      message: describeError(error),
      ...(error instanceof ValidationError && error.issues.length > 0
        ? { issues: error.issues }
        : {})
    }
  });
}

function listen(app: Express, host: string, port: number): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    server.once('listening', () => resolve(server));
    server.once('error', (error) => reject(error));
  });
}

function closeServer(server: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
    server.closeAllConnections();
  });
}

function formatPrometheusMetrics(values: {
  processUptimeSeconds: number;
  registrations: number;
  patchesSentTotal: number;
  patchesFailedTotal: number;
  patchesDroppedTotal: number;
  heartbeatWavesTotal: number;
  heartbeatFailuresTotal: number;
  heartbeatRemovalsTotal: number;
}): string {
  return [
    '# TYPE service_registry_process_uptime_seconds gauge',
    `service_registry_process_uptime_seconds ${values.processUptimeSeconds}`,
    '# TYPE service_registry_registrations gauge',
    `service_registry_registrations ${values.registrations}`,
    '# TYPE service_registry_patches_sent_total counter',
    `service_registry_patches_sent_total ${values.patchesSentTotal}`,
    '# TYPE service_registry_patches_failed_total counter',
    `service_registry_patches_failed_total ${values.patchesFailedTotal}`,
    '# TYPE service_registry_patches_dropped_total counter',
    `service_registry_patches_dropped_total ${values.patchesDroppedTotal}`,
    '# TYPE service_registry_heartbeat_waves_total counter',
    `service_registry_heartbeat_waves_total ${values.heartbeatWavesTotal}`,
    '# TYPE service_registry_heartbeat_failures_total counter',
    `service_registry_heartbeat_failures_total ${values.heartbeatFailuresTotal}`,
    '# TYPE service_registry_heartbeat_removals_total counter',
    `service_registry_heartbeat_removals_total ${values.heartbeatRemovalsTotal}`,
    ''
  ].join('\n');
}

function resolveRequestId(req: Request, res: Response): string {
  const provided = req.header('x-request-id')?.trim();
  const requestId =
    provided && provided.length > 0 && provided.length <= 128 ? provided : randomUUID();
  res.setHeader('x-request-id', requestId);
  return requestId;
}
