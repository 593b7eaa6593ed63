import type { ToolDefinition } from './tool_definition.js';

import { strictObjectSchema, stringSchema } from './schema.js';

export const ASSET_TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'asset_find_asset_by_query',
    description:
      'Find assets by path substring and/or exact class name (case-insensitive).',
    inputSchema: strictObjectSchema({
      properties: {
        name: stringSchema('Substring of the asset path'),
        asset_type: stringSchema('Asset class, e.g. StaticMesh'),
      },
    }),
  },
  {
    name: 'asset_get_static_mesh_asset_details',
    description: 'Bounds, dimensions, LOD and vertex counts of a static mesh.',
    inputSchema: strictObjectSchema({
      properties: { asset_path: stringSchema('Static mesh asset path') },
      required: ['asset_path'],
    }),
  },
];
