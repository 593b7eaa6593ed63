import type { ToolDefinition } from './tool_definition.js';

import { strictObjectSchema } from './schema.js';

export const SERVER_TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'server_info',
    description:
      'Return server metadata and the bridge endpoint (no editor required).',
    inputSchema: strictObjectSchema({}),
  },
];
