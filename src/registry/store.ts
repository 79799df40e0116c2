import { AuditLogger } from '../audit/logger.js';
import { StoreInternalError, describeError } from '../errors.js';
import { entryOf, type Patch, type PatchEntry, type Registration } from './model.js';
import type { DependencyNotifier } from './notifier.js';

export interface RegistryStoreOptions {
  notifier: DependencyNotifier;
  auditLogger?: AuditLogger;
}

/**
 * Live registrations in registration order, keyed by `serviceUrl`.
 *
 * Every read or write of `registrations` happens in a synchronous block with
 * no `await` inside, so the event loop runs it to completion before any other
 * caller can observe the list. Network I/O only ever sees copies taken in
 * such a block.
 */
export class RegistryStore {
  private readonly notifier: DependencyNotifier;
  private readonly auditLogger: AuditLogger;
  private registrations: Registration[] = [];
  private closed = false;

  constructor(options: RegistryStoreOptions) {
    this.notifier = options.notifier;
    this.auditLogger = options.auditLogger ?? AuditLogger.disabled();
  }

  /**
   * Makes the registration live, announces it to its dependents, then sends it
   * the live services it depends on. A failed catch-up rejects with the
   * `DeliveryError` but leaves the registration live.
   */
  async add(registration: Registration): Promise<void> {
    this.assertOpen();
    console.error(
      `[service-registry] add service ${registration.serviceName} with url ${registration.serviceUrl}`
    );

    const previous = this.registrations.find(
      (existing) => existing.serviceUrl === registration.serviceUrl
    );
    this.registrations = [
      ...this.registrations.filter((existing) => existing.serviceUrl !== registration.serviceUrl),
      registration
    ];
    const dependents = this.registrations.filter((existing) => existing !== registration);
    const catchUp = this.dependenciesOf(registration);

    this.notifier.notify(announce(previous, registration), dependents);
    void this.auditLogger.log({
      action: previous ? 'registry.replace' : 'registry.add',
      target: registration.serviceUrl,
      details: {
        name: registration.serviceName,
        requiredServices: [...registration.requiredServices],
        dependentsNotified: dependents.length
      }
    });

    if (registration.requiredServices.length === 0) {
      return;
    }

    try {
      await this.notifier.deliver({ added: catchUp, removed: [] }, registration.serviceUpdateUrl);
    } catch (error) {
      void this.auditLogger.log({
        action: 'registry.catch_up_failed',
        target: registration.serviceUrl,
        details: { name: registration.serviceName, reason: describeError(error) }
      });
      throw error;
    }
  }

  /** Drops every registration at `url` and tells dependents. Resolves the number removed. */
  async remove(url: string): Promise<number> {
    this.assertOpen();

    const removed = this.registrations.filter((existing) => existing.serviceUrl === url);
    if (removed.length === 0) {
      return 0;
    }

    this.registrations = this.registrations.filter((existing) => existing.serviceUrl !== url);
    const remaining = [...this.registrations];
    this.notifier.notify({ added: [], removed: removed.map(entryOf) }, remaining);

    for (const registration of removed) {
      console.error(
        `[service-registry] removed service ${registration.serviceName} with url ${registration.serviceUrl}`
      );
      void this.auditLogger.log({
        action: 'registry.remove',
        target: registration.serviceUrl,
        details: { name: registration.serviceName }
      });
    }

    return removed.length;
  }

  snapshot(): Registration[] {
    return [...this.registrations];
  }

  has(url: string): boolean {
    return this.registrations.some((existing) => existing.serviceUrl === url);
  }

  size(): number {
    return this.registrations.length;
  }

  close(): void {
    this.closed = true;
  }

  private dependenciesOf(registration: Registration): PatchEntry[] {
    const required = new Set(registration.requiredServices);
    return this.registrations
      .filter(
        (existing) =>
          existing.serviceUrl !== registration.serviceUrl && required.has(existing.serviceName)
      )
      .map(entryOf);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreInternalError('Registry store is closed.');
    }
  }
}

function announce(previous: Registration | undefined, next: Registration): Patch {
  if (!previous) {
    return { added: [entryOf(next)], removed: [] };
  }

  if (previous.serviceName === next.serviceName) {
    return { added: [], removed: [] };
  }

  return { added: [entryOf(next)], removed: [entryOf(previous)] };
}
