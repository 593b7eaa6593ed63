import type { ToolDefinition } from './tool_definition.js';

import { strictObjectSchema, stringSchema } from './schema.js';

export const UTIL_TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'util_print_message',
    description: 'Write a message to the editor output log.',
    inputSchema: strictObjectSchema({
      properties: { message: stringSchema('Message text') },
      required: ['message'],
    }),
  },
  {
    name: 'util_get_output_log',
    description: 'Read the tail of the editor output log.',
    inputSchema: strictObjectSchema({
      properties: {
        line_count: {
          type: 'integer',
          minimum: 1,
          description: 'Number of trailing lines (default: 50)',
        },
        keyword: stringSchema('Only lines containing this text'),
      },
    }),
  },
];
