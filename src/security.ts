import {
  appendFileSync,
  existsSync,
  mkdirSync,
  renameSync,
  rmSync,
  statSync,
} from 'fs';
import path from 'path';

import { loadAuditRotationConfig } from './config.js';
import type { AuditRotationConfig } from './config.js';
import { isRecord } from './validation.js';

export interface AuditEntry {
  ts: string;
  module: string;
  function: string;
  args: unknown;
  ok: boolean;
  type?: string;
  message: string;
  durationMs: number;
}

const REDACTED = '[REDACTED]';

/** Words that mark a key as secret on their own, or when joined ("api_key"). */
const SECRET_WORDS = new Set([
  'token',
  'password',
  'passwd',
  'secret',
  'apikey',
  'privatekey',
  'credential',
  'credentials',
]);

const SECRET_WORD_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['api', 'key'],
  ['private', 'key'],
  ['access', 'key'],
];

function keyWords(key: string): string[] {
  return key
    .replace(/([a-z0-9])([A-Z])/gu, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/gu, '$1 $2')
    .split(/[^a-zA-Z0-9]+/u)
    .map((word) => word.toLowerCase())
    .filter(Boolean);
}

export function isSensitiveKey(key: string): boolean {
  const words = keyWords(key);
  if (words.length === 0) return false;
  if (SECRET_WORDS.has(words.join(''))) return true;
  if (words.some((word) => SECRET_WORDS.has(word))) return true;
  return SECRET_WORD_PAIRS.some(
    ([first, second]) => words.includes(first) && words.includes(second),
  );
}

export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (!isRecord(value)) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [
      key,
      isSensitiveKey(key) ? REDACTED : redactSecrets(inner),
    ]),
  );
}

// audit.log -> audit.log.1 -> ... -> audit.log.<backups>, oldest dropped
function rotate(auditPath: string, backups: number): void {
  rmSync(`${auditPath}.${backups}`, { force: true });
  for (let n = backups - 1; n >= 1; n -= 1) {
    const from = `${auditPath}.${n}`;
    if (existsSync(from)) renameSync(from, `${auditPath}.${n + 1}`);
  }
  renameSync(auditPath, `${auditPath}.1`);
}

/** Appends one JSON line to the bridge audit log, rotating by size first. */
export function appendAuditLog(
  auditPath: string,
  entry: AuditEntry,
  rotation: AuditRotationConfig = loadAuditRotationConfig(),
): void {
  mkdirSync(path.dirname(auditPath), { recursive: true });
  if (existsSync(auditPath) && statSync(auditPath).size >= rotation.maxBytes) {
    rotate(auditPath, rotation.backups);
  }
  appendFileSync(auditPath, `${JSON.stringify(entry)}\n`, 'utf8');
}
