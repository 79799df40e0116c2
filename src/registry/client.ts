import { DeliveryError, describeError } from '../errors.js';
import { encodePatch, type Patch } from './model.js';

export interface PatchTransport {
  sendPatch(url: string, patch: Patch, signal?: AbortSignal): Promise<void>;
}

export interface HealthProbe {
  checkHealth(url: string, signal?: AbortSignal): Promise<void>;
}

export interface ServiceHttpClientOptions {
  timeoutMs: number;
}

export class ServiceHttpClient implements PatchTransport, HealthProbe {
  private readonly timeoutMs: number;

  constructor(options: ServiceHttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  async sendPatch(url: string, patch: Patch, signal?: AbortSignal): Promise<void> {
    const response = await this.request(url, signal, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(encodePatch(patch))
    });

    if (!response.ok) {
      throw new DeliveryError(url, `Failed to send patch with code: ${response.status}`, {
        status: response.status
      });
    }
  }

  async checkHealth(url: string, signal?: AbortSignal): Promise<void> {
    const response = await this.request(url, signal, { method: 'GET' });

    if (response.status !== 200) {
      throw new DeliveryError(url, `Heartbeat returned status ${response.status}`, {
        status: response.status
      });
    }
  }

  private async request(
    url: string,
    signal: AbortSignal | undefined,
    init: RequestInit
  ): Promise<Response> {
    const { signal: bounded, dispose } = withTimeout(this.timeoutMs, signal);
    try {
      const response = await fetch(url, { ...init, signal: bounded });
      // Drain the body so the socket goes back to the pool.
      await response.arrayBuffer();
      return response;
    } catch (error) {
      if (error instanceof DeliveryError) {
        throw error;
      }

      throw new DeliveryError(url, `Request to ${url} failed: ${describeError(error)}`, {
        cause: error
      });
    } finally {
      dispose();
    }
  }
}

function withTimeout(
  timeoutMs: number,
  parent: AbortSignal | undefined
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
