export interface BridgeEndpointConfig {
  host: string;
  port: number;
}

export interface BridgeClientConfig extends BridgeEndpointConfig {
  timeoutMs: number;
  maxResponseBytes: number;
}

export interface BridgeServerConfig extends BridgeEndpointConfig {
  maxRequestBytes: number;
  readTimeoutMs: number;
  executeTimeoutMs: number;
  actionsDirectory?: string;
  auditLogPath?: string;
}

export interface AuditRotationConfig {
  maxBytes: number;
  backups: number;
}

export const DEFAULT_BRIDGE_HOST = '127.0.0.1';
export const DEFAULT_BRIDGE_PORT = 12029;

type Env = Record<string, string | undefined>;

export function parsePositiveInt(
  value: string | undefined,
  fallback: number,
): number {
  if (!value) return fallback;
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n <= 0) return fallback;
  return n;
}

function parsePort(value: string | undefined): number {
  const port = parsePositiveInt(value, DEFAULT_BRIDGE_PORT);
  return port <= 65535 ? port : DEFAULT_BRIDGE_PORT;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function isDebugEnabled(env: Env = process.env): boolean {
  return env.DEBUG === 'true';
}

export function loadClientConfig(env: Env = process.env): BridgeClientConfig {
  return {
    host: optionalString(env.EDITOR_BRIDGE_HOST) ?? DEFAULT_BRIDGE_HOST,
    port: parsePort(env.EDITOR_BRIDGE_PORT),
    timeoutMs: parsePositiveInt(env.EDITOR_BRIDGE_TIMEOUT_MS, 30000),
    maxResponseBytes: parsePositiveInt(
      env.EDITOR_BRIDGE_MAX_RESPONSE_BYTES,
      64 * 1024 * 1024,
    ),
  };
}

export function loadServerConfig(env: Env = process.env): BridgeServerConfig {
  return {
    host: optionalString(env.EDITOR_BRIDGE_HOST) ?? DEFAULT_BRIDGE_HOST,
    port: parsePort(env.EDITOR_BRIDGE_PORT),
    maxRequestBytes: parsePositiveInt(
      env.EDITOR_BRIDGE_MAX_REQUEST_BYTES,
      8 * 1024 * 1024,
    ),
    readTimeoutMs: parsePositiveInt(env.EDITOR_BRIDGE_READ_TIMEOUT_MS, 30000),
    executeTimeoutMs: parsePositiveInt(
      env.EDITOR_BRIDGE_EXEC_TIMEOUT_MS,
      60000,
    ),
    actionsDirectory: optionalString(env.EDITOR_BRIDGE_ACTIONS_DIR),
    auditLogPath: optionalString(env.EDITOR_BRIDGE_AUDIT_LOG),
  };
}

export function loadAuditRotationConfig(
  env: Env = process.env,
): AuditRotationConfig {
  return {
    maxBytes: parsePositiveInt(
      env.EDITOR_BRIDGE_AUDIT_MAX_BYTES,
      5 * 1024 * 1024,
    ),
    backups: parsePositiveInt(env.EDITOR_BRIDGE_AUDIT_BACKUPS, 3),
  };
}
