import type { AuditLogger } from '../audit/logger.js';
import { DeliveryError, describeError } from '../errors.js';
import { delay, retryAsync } from '../lib/retry.js';
import type { HealthProbe } from './client.js';
import type { Registration } from './model.js';
import type { RegistryStore } from './store.js';

/**
 * `eager` removes an endpoint on its first failed attempt and re-adds it if a
 * later attempt in the same probe succeeds. `exhausted` removes it only once
 * every attempt has failed.
 */
export type RemovalPolicy = 'eager' | 'exhausted';

export interface HeartbeatConfig {
  intervalMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  removalPolicy: RemovalPolicy;
}

export const DEFAULT_HEARTBEAT_CONFIG: HeartbeatConfig = {
  intervalMs: 3_000,
  maxAttempts: 3,
  retryDelayMs: 1_000,
  removalPolicy: 'eager'
};

export interface HeartbeatMonitorOptions {
  store: RegistryStore;
  probe: HealthProbe;
  config?: Partial<HeartbeatConfig>;
  auditLogger?: AuditLogger;
}

export type ProbeOutcome = 'healthy' | 'recovered' | 'removed';

export interface HeartbeatStats {
  waves: number;
  probeFailures: number;
  removals: number;
  recoveries: number;
}

export class HeartbeatMonitor {
  private readonly store: RegistryStore;
  private readonly probe: HealthProbe;
  private readonly config: HeartbeatConfig;
  private readonly auditLogger?: AuditLogger;
  private readonly controller = new AbortController();
  private loop?: Promise<void>;
  private readonly counters: HeartbeatStats = {
    waves: 0,
    probeFailures: 0,
    removals: 0,
    recoveries: 0
  };

  constructor(options: HeartbeatMonitorOptions) {
    this.store = options.store;
    this.probe = options.probe;
    this.config = { ...DEFAULT_HEARTBEAT_CONFIG, ...options.config };
    this.auditLogger = options.auditLogger;
  }

  isRunning(): boolean {
    return this.loop !== undefined && !this.controller.signal.aborted;
  }

  /** Starts the wave loop. Later calls, including after `stop()`, do nothing. */
  start(): void {
    if (this.loop || this.controller.signal.aborted) {
      return;
    }

    console.error(
      `[registry-heartbeat] starting, interval ${this.config.intervalMs}ms, ${this.config.maxAttempts} attempts, ${this.config.removalPolicy} removal`
    );
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error('heartbeat monitor stopped'));
    }

    await this.loop;
  }

  /** Probes every live registration concurrently and waits for all of them. */
  async runWave(): Promise<ProbeOutcome[]> {
    const registrations = this.store.snapshot();
    this.counters.waves += 1;

    const results = await Promise.allSettled(
      registrations.map((registration) => this.probeRegistration(registration))
    );

    const outcomes: ProbeOutcome[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        outcomes.push(result.value);
        return;
      }

      if (!this.controller.signal.aborted) {
        console.error(
          `[registry-heartbeat] probe task for ${registrations[index]?.serviceUrl ?? 'unknown'} failed:`,
          result.reason
        );
      }
    });

    return outcomes;
  }

  stats(): HeartbeatStats {
    return { ...this.counters };
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      try {
        await this.runWave();
        await delay(this.config.intervalMs, signal);
      } catch (error) {
        if (signal.aborted) {
          return;
        }

        console.error('[registry-heartbeat] wave failed:', error);
      }
    }
  }

  private async probeRegistration(registration: Registration): Promise<ProbeOutcome> {
    const signal = this.controller.signal;
    const eager = this.config.removalPolicy === 'eager';
    let evicted = false;

    try {
      await retryAsync(() => this.probe.checkHealth(registration.heartbeatUrl, signal), {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryDelayMs,
        backoff: 'fixed',
        signal,
        shouldRetry: () => !signal.aborted,
        onFailure: async (error, attempt) => {
          if (signal.aborted) {
            return;
          }

          this.counters.probeFailures += 1;
          console.error(
            `[registry-heartbeat] check failed for ${registration.serviceName} (attempt ${attempt}/${this.config.maxAttempts}): ${describeError(error)}`
          );
          if (eager && (await this.evict(registration, attempt))) {
            evicted = true;
          }
        }
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }

      if (!eager) {
        await this.evict(registration, this.config.maxAttempts);
      }
      return 'removed';
    }

    if (evicted) {
      if (this.store.has(registration.serviceUrl)) {
        console.error(
          `[registry-heartbeat] ${registration.serviceName} re-registered during its probe, keeping the newer registration`
        );
        return 'healthy';
      }

      try {
        await this.store.add(registration);
      } catch (error) {
        if (!(error instanceof DeliveryError)) {
          throw error;
        }

        console.error(
          `[registry-heartbeat] ${registration.serviceName} re-added, catch-up failed: ${describeError(error)}`
        );
      }
      this.counters.recoveries += 1;
      console.error(`[registry-heartbeat] ${registration.serviceName} recovered, re-added`);
      void this.auditLogger?.log({
        action: 'heartbeat.recovered',
        target: registration.serviceUrl,
        details: { name: registration.serviceName }
      });
      return 'recovered';
    }

    return 'healthy';
  }

  private async evict(registration: Registration, attempt: number): Promise<boolean> {
    const removed = await this.store.remove(registration.serviceUrl);
    if (removed === 0) {
      return false;
    }

    this.counters.removals += 1;
    void this.auditLogger?.log({
      action: 'heartbeat.failed',
      target: registration.serviceUrl,
      details: { name: registration.serviceName, attempt }
    });
    return true;
  }
}
