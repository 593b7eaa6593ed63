import { createRequire } from 'node:module';

import { isRecord } from './validation.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');

export const PACKAGE_NAME =
  isRecord(pkg) && typeof pkg.name === 'string'
    ? pkg.name
    : 'editor-action-bridge';

export const PACKAGE_VERSION =
  isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';

export const MCP_SERVER_INFO = {
  name: PACKAGE_NAME,
  version: PACKAGE_VERSION,
} as const;
