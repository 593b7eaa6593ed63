#!/usr/bin/env node
import { getErrorMessage } from './bridge/errors.js';
import { EditorBridgeMcpServer } from './server.js';

const server = new EditorBridgeMcpServer();
server.run().catch((error: unknown) => {
  console.error('[SERVER] Failed to start:', getErrorMessage(error));
  process.exit(1);
});
