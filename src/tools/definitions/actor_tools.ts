import type { ToolDefinition } from './tool_definition.js';

import { strictObjectSchema, stringSchema, vector3Schema } from './schema.js';

const actorLabel = stringSchema('Label of the actor in the current level');
const location = vector3Schema('World location [x, y, z]');
const rotation = vector3Schema('Rotation [pitch, yaw, roll] in degrees');
const scale = vector3Schema('Scale [x, y, z]');

export const ACTOR_TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'actor_spawn_from_class',
    description: 'Spawn an actor from a class path at a location.',
    inputSchema: strictObjectSchema({
      properties: {
        class_path: stringSchema(
          'Class path, e.g. /Script/Engine.StaticMeshActor',
        ),
        location,
        rotation,
      },
      required: ['class_path', 'location'],
    }),
  },
  {
    name: 'actor_spawn_from_object',
    description: 'Place an actor for an asset (e.g. a static mesh).',
    inputSchema: strictObjectSchema({
      properties: {
        asset_path: stringSchema('Asset object path'),
        location,
      },
      required: ['asset_path', 'location'],
    }),
  },
  {
    name: 'actor_delete_by_label',
    description: 'Delete the actor with the given label.',
    inputSchema: strictObjectSchema({
      properties: { actor_label: actorLabel },
      required: ['actor_label'],
    }),
  },
  {
    name: 'actor_list_all_with_locations',
    description: 'List every actor in the level with its location.',
    inputSchema: strictObjectSchema({}),
  },
  {
    name: 'actor_get_all_details',
    description:
      'List every actor with class, transform, world bounds and mesh asset.',
    inputSchema: strictObjectSchema({}),
  },
  {
    name: 'actor_set_transform',
    description:
      'Set any of location, rotation and scale on an actor (at least one).',
    inputSchema: strictObjectSchema({
      properties: { actor_label: actorLabel, location, rotation, scale },
      required: ['actor_label'],
    }),
  },
  {
    name: 'actor_set_location',
    description: 'Move an actor.',
    inputSchema: strictObjectSchema({
      properties: { actor_label: actorLabel, location },
      required: ['actor_label', 'location'],
    }),
  },
  {
    name: 'actor_set_rotation',
    description: 'Rotate an actor.',
    inputSchema: strictObjectSchema({
      properties: { actor_label: actorLabel, rotation },
      required: ['actor_label', 'rotation'],
    }),
  },
  {
    name: 'actor_set_scale',
    description: 'Scale an actor.',
    inputSchema: strictObjectSchema({
      properties: { actor_label: actorLabel, scale },
      required: ['actor_label', 'scale'],
    }),
  },
  {
    name: 'actor_select_all',
    description: 'Select every actor in the level.',
    inputSchema: strictObjectSchema({}),
  },
  {
    name: 'actor_invert_selection',
    description: 'Invert the current actor selection.',
    inputSchema: strictObjectSchema({}),
  },
  {
    name: 'actor_duplicate_selected',
    description: 'Duplicate the selected actors, offset by a vector.',
    inputSchema: strictObjectSchema({
      properties: { offset: vector3Schema('Offset [x, y, z]') },
      required: ['offset'],
    }),
  },
];
