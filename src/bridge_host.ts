#!/usr/bin/env node
import { BridgeDispatcher } from './bridge/dispatcher.js';
import { getErrorMessage } from './bridge/errors.js';
import { ActionRegistry } from './bridge/registry.js';
import { BridgeTcpServer } from './bridge/tcp_server.js';
import { isDebugEnabled, loadServerConfig } from './config.js';
import { MemoryEditorHost } from './host/memory_host.js';

const DEBUG_MODE = isDebugEnabled();

function logDebug(message: string): void {
  if (DEBUG_MODE) console.error(`[DEBUG] ${message}`);
}

async function main(): Promise<void> {
  const config = loadServerConfig();

  const host = new MemoryEditorHost({
    onLog: (line) => console.error(`[HOST] ${line}`),
  });
  const registry = new ActionRegistry({
    reloadDirectory: config.actionsDirectory,
    logDebug,
  });
  const dispatcher = new BridgeDispatcher({
    registry,
    host,
    executeTimeoutMs: config.executeTimeoutMs,
    auditLogPath: config.auditLogPath,
    logDebug,
  });
  const server = new BridgeTcpServer({
    dispatcher,
    host: config.host,
    port: config.port,
    maxRequestBytes: config.maxRequestBytes,
    readTimeoutMs: config.readTimeoutMs,
    logDebug,
  });

  await server.start();
  logDebug(`Modules: ${(await registry.listModules()).join(', ')}`);

  process.once('SIGINT', () => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[BRIDGE] Shutdown failed:', getErrorMessage(error));
        process.exit(1);
      },
    );
  });
}

main().catch((error: unknown) => {
  console.error('[BRIDGE] Failed to start:', getErrorMessage(error));
  process.exit(1);
});
