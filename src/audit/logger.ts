import { appendFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface AuditLoggerOptions {
  enabled: boolean;
  filePath: string;
  maxFileBytes: number;
  maxFiles: number;
  service: string;
  serviceVersion: string;
}

export type AuditAction =
  | 'registry.add'
  | 'registry.replace'
  | 'registry.remove'
  | 'registry.catch_up_failed'
  | 'heartbeat.failed'
  | 'heartbeat.recovered';

export interface AuditEvent {
  action: AuditAction;
  target: string;
  details?: Record<string, string | number | boolean | string[]>;
}

/**
 * Appends membership changes to a JSON-lines file. Writes are chained so
 * lines never interleave; the file rotates to `<file>.1..N` once it would
 * exceed `maxFileBytes`.
 */
export class AuditLogger {
  private readonly enabled: boolean;
  private readonly filePath: string;
  private readonly maxFileBytes: number;
  private readonly maxFiles: number;
  private readonly service: string;
  private readonly serviceVersion: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: AuditLoggerOptions) {
    this.enabled = options.enabled;
    this.filePath = options.filePath;
    this.maxFileBytes = options.maxFileBytes;
    this.maxFiles = options.maxFiles;
    this.service = options.service;
    this.serviceVersion = options.serviceVersion;
  }

  static disabled(): AuditLogger {
    return new AuditLogger({
      enabled: false,
      filePath: '',
      maxFileBytes: 1,
      maxFiles: 1,
      service: 'service-registry',
      serviceVersion: '0.0.0'
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  log(event: AuditEvent): Promise<void> {
    if (!this.enabled) {
      return Promise.resolve();
    }

    this.writeChain = this.writeChain.then(async () => {
      const line = JSON.stringify({
        timestamp: new Date().toISOString(),
        service: this.service,
        serviceVersion: this.serviceVersion,
        ...event
      });

      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        await this.rotateIfNeeded(line);
        await appendFile(this.filePath, `${line}\n`, 'utf8');
      } catch (error) {
        console.error('[service-registry] audit write failed:', error);
      }
    });

    return this.writeChain;
  }

  flush(): Promise<void> {
    return this.writeChain;
  }

  private async rotateIfNeeded(line: string): Promise<void> {
    const incomingBytes = Buffer.byteLength(`${line}\n`, 'utf8');
    const currentSize = await this.currentFileSize();
    if (currentSize === 0 || currentSize + incomingBytes <= this.maxFileBytes) {
      return;
    }

    await rm(`${this.filePath}.${this.maxFiles}`, { force: true });
    for (let idx = this.maxFiles - 1; idx >= 1; idx -= 1) {
      await renameIfExists(`${this.filePath}.${idx}`, `${this.filePath}.${idx + 1}`);
    }
    await renameIfExists(this.filePath, `${this.filePath}.1`);
  }

  private async currentFileSize(): Promise<number> {
    try {
      const fileStat = await stat(this.filePath);
      return fileStat.size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }

      throw error;
    }
  }
}

async function renameIfExists(fromPath: string, toPath: string): Promise<void> {
  try {
    await rename(fromPath, toPath);
  } catch (error) {
    if (isMissingFile(error)) {
      return;
    }

    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
