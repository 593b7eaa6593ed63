import type { ToolDefinition } from './tool_definition.js';

import { looseObjectSchema, strictObjectSchema, stringSchema } from './schema.js';

export const BRIDGE_TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'bridge_call',
    description:
      'Call any registered bridge action by module and function name.',
    inputSchema: strictObjectSchema({
      properties: {
        module: stringSchema('Action module, e.g. actor_actions'),
        function: stringSchema('Action name, e.g. ue_list_all_with_locations'),
        args: looseObjectSchema({
          description: 'Keyword arguments for the action (default: {})',
        }),
      },
      required: ['module', 'function'],
    }),
  },
];
