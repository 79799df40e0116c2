import { mkdtemp, readdir, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { AuditLogger } from '../src/audit/logger.js';

async function createLogger(overrides: { maxFileBytes?: number; maxFiles?: number } = {}) {
  const root = await mkdtemp(join(tmpdir(), 'service-registry-audit-'));
  const filePath = join(root, 'audit.log');
  const logger = new AuditLogger({
    enabled: true,
    filePath,
    maxFileBytes: overrides.maxFileBytes ?? 10_000,
    maxFiles: overrides.maxFiles ?? 2,
    service: 'service-registry-test',
    serviceVersion: 'test'
  });

  return { root, filePath, logger };
}

describe('AuditLogger', () => {
  it('writes one JSON line per event', async () => {
    const { filePath, logger } = await createLogger();

    await logger.log({
      action: 'registry.add',
      target: 'http://localhost:4000',
      details: { serviceName: 'Log Service', requiredServices: [] }
    });
    await logger.log({ action: 'registry.remove', target: 'http://localhost:4000' });

    const lines = (await readFile(filePath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      service: 'service-registry-test',
      serviceVersion: 'test',
      action: 'registry.add',
      target: 'http://localhost:4000',
      details: { serviceName: 'Log Service', requiredServices: [] }
    });
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ action: 'registry.remove' });
  });

  it('rotates audit files by size and keeps max backup files', async () => {
    const { root, logger } = await createLogger({ maxFileBytes: 280, maxFiles: 2 });

    for (let idx = 0; idx < 12; idx += 1) {
      await logger.log({
        action: 'heartbeat.failed',
        target: `http://localhost:${4000 + idx}`,
        details: { attempt: idx, marker: 'rotation-check' }
      });
    }

    const files = await readdir(root);
    expect(files).toContain('audit.log');
    expect(files).toContain('audit.log.1');
    expect(files).toContain('audit.log.2');
    expect(files).not.toContain('audit.log.3');
  });

  it('flush waits for queued writes', async () => {
    const { filePath, logger } = await createLogger();

    void logger.log({ action: 'registry.add', target: 'http://localhost:4000' });
    void logger.log({ action: 'heartbeat.recovered', target: 'http://localhost:4000' });
    await logger.flush();

    const lines = (await readFile(filePath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ action: 'registry.add' });
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ action: 'heartbeat.recovered' });
  });

  it('writes nothing when disabled', async () => {
    const root = await mkdtemp(join(tmpdir(), 'service-registry-audit-off-'));
    const logger = new AuditLogger({
      enabled: false,
      filePath: join(root, 'audit.log'),
      maxFileBytes: 10_000,
      maxFiles: 2,
      service: 'service-registry-test',
      serviceVersion: 'test'
    });

    await logger.log({ action: 'registry.add', target: 'http://localhost:4000' });
    await logger.flush();

    expect(logger.isEnabled()).toBe(false);
    expect(await readdir(root)).toEqual([]);
  });
});
