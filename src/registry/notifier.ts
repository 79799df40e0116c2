import { DeliveryError, describeError } from '../errors.js';
import { TaskPool, type TaskPoolStats } from '../lib/task-pool.js';
import type { PatchTransport } from './client.js';
import { filterPatch, isEmptyPatch, type Patch, type Registration } from './model.js';

export interface DependencyNotifierOptions {
  transport: PatchTransport;
  maxConcurrency: number;
  maxQueued: number;
}

export interface NotifierStats {
  sent: number;
  failed: number;
  pool: TaskPoolStats;
}

/**
 * Pushes patches to dependents. Each subscriber gets its own pooled task, so
 * a slow or dead subscriber only delays itself; deliveries to one update url
 * run one at a time, in the order they were submitted. Broadcast delivery is
 * best effort: failures are logged and counted, never retried or rethrown.
 */
export class DependencyNotifier {
  private readonly transport: PatchTransport;
  private readonly pool: TaskPool;
  private readonly tails = new Map<string, Promise<void>>();
  private sent = 0;
  private failed = 0;

  constructor(options: DependencyNotifierOptions) {
    this.transport = options.transport;
    this.pool = new TaskPool({
      maxConcurrency: options.maxConcurrency,
      maxQueued: options.maxQueued,
      label: 'registry-notify'
    });
  }

  notify(fullPatch: Patch, subscribers: readonly Registration[]): void {
    if (isEmptyPatch(fullPatch)) {
      return;
    }

    for (const subscriber of subscribers) {
      if (!subscriber.requiredServices.some((name) => touches(fullPatch, name))) {
        continue;
      }

      this.chain(subscriber.serviceUpdateUrl, (signal) =>
        this.deliverFiltered(subscriber, fullPatch, signal)
      );
    }
  }

  /**
   * Sends one patch behind anything already queued for `url` and waits for it;
   * used for catch-up, where failure matters.
   */
  deliver(patch: Patch, url: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.chain(
        url,
        async (signal) => {
          try {
            await this.transport.sendPatch(url, patch, signal);
            this.sent += 1;
            resolve();
          } catch (error) {
            this.failed += 1;
            reject(error);
          }
        },
        () => reject(new DeliveryError(url, `Patch to ${url} was dropped by the notifier queue.`))
      );
    });
  }

  idle(): Promise<void> {
    return this.pool.idle();
  }

  close(): Promise<void> {
    return this.pool.close();
  }

  stats(): NotifierStats {
    return { sent: this.sent, failed: this.failed, pool: this.pool.stats() };
  }

  /**
   * Submits `work` to the pool so that it starts only after the previous
   * delivery to the same url has settled. The pool launches in submission
   * order, so a waiting task never blocks the one it waits on.
   */
  private chain(
    url: string,
    work: (signal: AbortSignal) => Promise<void>,
    onDropped?: () => void
  ): void {
    const previous = this.tails.get(url) ?? Promise.resolve();
    let settle = (): void => undefined;
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.tails.set(url, done);
    const release = (): void => {
      settle();
      if (this.tails.get(url) === done) {
        this.tails.delete(url);
      }
    };

    this.pool.submit(
      async (signal) => {
        try {
          await previous;
          await work(signal);
        } finally {
          release();
        }
      },
      () => {
        release();
        onDropped?.();
      }
    );
  }

  private async deliverFiltered(
    subscriber: Registration,
    fullPatch: Patch,
    signal: AbortSignal
  ): Promise<void> {
    for (const name of subscriber.requiredServices) {
      const patch = filterPatch(fullPatch, name);
      if (isEmptyPatch(patch)) {
        continue;
      }

      if (!(await this.send(subscriber, patch, signal))) {
        return;
      }
    }
  }

  private async send(
    subscriber: Registration,
    patch: Patch,
    signal: AbortSignal
  ): Promise<boolean> {
    try {
      await this.transport.sendPatch(subscriber.serviceUpdateUrl, patch, signal);
      this.sent += 1;
      return true;
    } catch (error) {
      this.failed += 1;
      console.error(
        `[registry-notify] patch to ${subscriber.serviceName} at ${subscriber.serviceUpdateUrl} failed: ${describeError(error)}`
      );
      return false;
    }
  }
}

function touches(patch: Patch, name: string): boolean {
  return (
    patch.added.some((entry) => entry.name === name) ||
    patch.removed.some((entry) => entry.name === name)
  );
}
