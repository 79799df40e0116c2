import { afterEach, describe, expect, it, vi } from 'vitest';

import { HeartbeatMonitor, type RemovalPolicy } from '../src/registry/heartbeat.js';
import { DependencyNotifier } from '../src/registry/notifier.js';
import { RegistryStore } from '../src/registry/store.js';
import { RecordingTransport, ScriptedProbe, registration } from './fakes.js';

const logService = registration('Log Service', 'http://localhost:4000');
const gradingService = registration('Grading Service', 'http://localhost:6000', ['Log Service']);
const logEntry = { name: 'Log Service', url: 'http://localhost:4000' };

const monitors: HeartbeatMonitor[] = [];

afterEach(async () => {
  while (monitors.length > 0) {
    await monitors.pop()?.stop();
  }
  vi.useRealTimers();
});

async function setup(removalPolicy: RemovalPolicy = 'eager') {
  const transport = new RecordingTransport();
  const probe = new ScriptedProbe();
  const notifier = new DependencyNotifier({ transport, maxConcurrency: 4, maxQueued: 100 });
  const store = new RegistryStore({ notifier });
  const monitor = new HeartbeatMonitor({
    store,
    probe,
    config: { intervalMs: 60_000, maxAttempts: 3, retryDelayMs: 0, removalPolicy }
  });
  monitors.push(monitor);

  await store.add(logService);
  await store.add(gradingService);
  await notifier.idle();
  transport.sent.length = 0;

  return { transport, probe, notifier, store, monitor };
}

describe('HeartbeatMonitor.runWave (eager removal)', () => {
  it('leaves healthy services alone', async () => {
    const { transport, probe, notifier, store, monitor } = await setup();

    await expect(monitor.runWave()).resolves.toEqual(['healthy', 'healthy']);
    await notifier.idle();

    expect(probe.calls).toEqual([logService.heartbeatUrl, gradingService.heartbeatUrl]);
    expect(store.snapshot()).toEqual([logService, gradingService]);
    expect(transport.sent).toEqual([]);
  });

  it('removes on the first failure and re-adds when a retry succeeds', async () => {
    const { transport, probe, notifier, store, monitor } = await setup();
    probe.script(logService.heartbeatUrl, [false, true]);
    const liveAtAttempt: boolean[] = [];
    probe.onCheck((url) => {
      if (url === logService.heartbeatUrl) {
        liveAtAttempt.push(store.has(logService.serviceUrl));
      }
    });

    const outcomes = await monitor.runWave();
    await notifier.idle();

    expect(outcomes).toEqual(['recovered', 'healthy']);
    expect(liveAtAttempt).toEqual([true, false]);
    expect(store.has(logService.serviceUrl)).toBe(true);
    expect(transport.sentTo(gradingService.serviceUpdateUrl)).toEqual([
      { added: [], removed: [logEntry] },
      { added: [logEntry], removed: [] }
    ]);
    expect(monitor.stats()).toEqual({ waves: 1, probeFailures: 1, removals: 1, recoveries: 1 });
  });

  it('sends exactly one removal when every attempt fails', async () => {
    const { transport, probe, notifier, store, monitor } = await setup();
    probe.script(logService.heartbeatUrl, [false, false, false]);

    const outcomes = await monitor.runWave();
    await notifier.idle();

    expect(outcomes).toEqual(['removed', 'healthy']);
    expect(probe.calls.filter((url) => url === logService.heartbeatUrl)).toHaveLength(3);
    expect(store.snapshot()).toEqual([gradingService]);
    expect(transport.sentTo(gradingService.serviceUpdateUrl)).toEqual([
      { added: [], removed: [logEntry] }
    ]);
    expect(monitor.stats()).toMatchObject({ probeFailures: 3, removals: 1, recoveries: 0 });
  });

  it('re-adds a recovered service even when its catch-up patch fails', async () => {
    const { transport, probe, notifier, store, monitor } = await setup();
    probe.script(gradingService.heartbeatUrl, [false, true]);
    transport.failFor(gradingService.serviceUpdateUrl);

    const outcomes = await monitor.runWave();
    await notifier.idle();

    expect(outcomes).toEqual(['healthy', 'recovered']);
    expect(store.snapshot()).toEqual([logService, gradingService]);
    expect(monitor.stats()).toMatchObject({ removals: 1, recoveries: 1 });
  });

  it('keeps a registration that replaced the evicted one during the retry pause', async () => {
    const { probe, notifier, store, monitor } = await setup();
    const relocated = { ...logService, heartbeatUrl: 'http://localhost:4000/health2' };
    probe.script(logService.heartbeatUrl, [false, true]);
    probe.onCheck((url, attempt) => {
      if (url === logService.heartbeatUrl && attempt === 2) {
        void store.add(relocated);
      }
    });

    const outcomes = await monitor.runWave();
    await notifier.idle();

    expect(outcomes).toEqual(['healthy', 'healthy']);
    expect(store.snapshot()).toEqual([gradingService, relocated]);
    expect(monitor.stats()).toMatchObject({ removals: 1, recoveries: 0 });
  });
});

describe('HeartbeatMonitor.runWave (removal after exhausting attempts)', () => {
  it('does not remove a service that recovers within the attempt budget', async () => {
    const { transport, probe, notifier, store, monitor } = await setup('exhausted');
    probe.script(logService.heartbeatUrl, [false, false, true]);
    const liveAtAttempt: boolean[] = [];
    probe.onCheck((url) => {
      if (url === logService.heartbeatUrl) {
        liveAtAttempt.push(store.has(logService.serviceUrl));
      }
    });

    await expect(monitor.runWave()).resolves.toEqual(['healthy', 'healthy']);
    await notifier.idle();

    expect(liveAtAttempt).toEqual([true, true, true]);
    expect(transport.sent).toEqual([]);
  });

  it('removes once after the last failed attempt', async () => {
    const { transport, probe, notifier, store, monitor } = await setup('exhausted');
    probe.script(logService.heartbeatUrl, [false, false, false]);

    await expect(monitor.runWave()).resolves.toEqual(['removed', 'healthy']);
    await notifier.idle();

    expect(store.snapshot()).toEqual([gradingService]);
    expect(transport.sentTo(gradingService.serviceUpdateUrl)).toEqual([
      { added: [], removed: [logEntry] }
    ]);
  });
});

describe('HeartbeatMonitor lifecycle', () => {
  it('starts at most once and runs a wave per interval', async () => {
    vi.useFakeTimers();
    const { probe, monitor } = await setup();

    monitor.start();
    monitor.start();
    expect(monitor.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(0);
    expect(monitor.stats().waves).toBe(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(monitor.stats().waves).toBe(2);
    expect(probe.calls).toHaveLength(4);

    await monitor.stop();
    expect(monitor.isRunning()).toBe(false);

    monitor.start();
    expect(monitor.isRunning()).toBe(false);
  });

  it('stop interrupts a retry pause', async () => {
    const transport = new RecordingTransport();
    const probe = new ScriptedProbe();
    const notifier = new DependencyNotifier({ transport, maxConcurrency: 1, maxQueued: 10 });
    const store = new RegistryStore({ notifier });
    const monitor = new HeartbeatMonitor({
      store,
      probe,
      config: { intervalMs: 60_000, retryDelayMs: 60_000 }
    });
    monitors.push(monitor);
    await store.add(logService);
    probe.script(logService.heartbeatUrl, [false, true]);

    monitor.start();
    await vi.waitFor(() => {
      expect(store.has(logService.serviceUrl)).toBe(false);
    });
    await monitor.stop();

    expect(probe.calls).toEqual([logService.heartbeatUrl]);
    expect(monitor.stats()).toMatchObject({ removals: 1, recoveries: 0 });
  });
});
