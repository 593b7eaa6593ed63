import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { appendAuditLog, isSensitiveKey, redactSecrets } from './security.js';
import type { AuditEntry } from './security.js';

const entry: AuditEntry = {
  ts: '2026-01-01T00:00:00.000Z',
  module: 'util_actions',
  function: 'ue_print_message',
  args: { message: 'hi' },
  ok: true,
  message: 'Action executed successfully.',
  durationMs: 3,
};

describe('redactSecrets', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      redactSecrets({
        message: 'hi',
        auth: { accessToken: 'test-secret', user: 'ada' },
        list: [{ password: 'test-secret' }],
      }),
    ).toEqual({
      message: 'hi',
      auth: { accessToken: '[REDACTED]', user: 'ada' },
      list: [{ password: '[REDACTED]' }],
    });
  });

  it('recognises split and camel-cased key names', () => {
    expect(isSensitiveKey('API-Key')).toBe(true);
    expect(isSensitiveKey('clientSecret')).toBe(true);
    expect(isSensitiveKey('privateKeyPath')).toBe(true);
    expect(isSensitiveKey('actor_label')).toBe(false);
    expect(isSensitiveKey('keyword')).toBe(false);
  });
});

describe('appendAuditLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'bridge-security-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and appends JSON lines', async () => {
    const auditPath = path.join(dir, 'nested', 'audit.log');
    appendAuditLog(auditPath, entry);
    appendAuditLog(auditPath, { ...entry, ok: false, type: 'ValidationError' });

    const lines = (await readFile(auditPath, 'utf8')).trim().split('\n');
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      entry,
      { ...entry, ok: false, type: 'ValidationError' },
    ]);
  });

  it('rotates the log once it reaches the size limit', async () => {
    const auditPath = path.join(dir, 'audit.log');
    await writeFile(auditPath, 'old contents\n');
    await writeFile(`${auditPath}.1`, 'older\n');
    await writeFile(`${auditPath}.2`, 'oldest\n');

    appendAuditLog(auditPath, entry, { maxBytes: 10, backups: 2 });

    expect((await readdir(dir)).sort()).toEqual([
      'audit.log',
      'audit.log.1',
      'audit.log.2',
    ]);
    expect(await readFile(`${auditPath}.1`, 'utf8')).toBe('old contents\n');
    expect(await readFile(`${auditPath}.2`, 'utf8')).toBe('older\n');
    expect(JSON.parse(await readFile(auditPath, 'utf8'))).toEqual(entry);
  });

  it('reads rotation limits from the environment by default', async () => {
    vi.stubEnv('EDITOR_BRIDGE_AUDIT_MAX_BYTES', '10');
    vi.stubEnv('EDITOR_BRIDGE_AUDIT_BACKUPS', '1');
    try {
      const auditPath = path.join(dir, 'audit.log');
      await writeFile(auditPath, 'old contents\n');
      appendAuditLog(auditPath, entry);
      expect(await readFile(`${auditPath}.1`, 'utf8')).toBe('old contents\n');
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
