import type { ToolDefinition } from './tool_definition.js';

import { ACTOR_TOOL_DEFINITIONS } from './actor_tools.js';
import { ASSET_TOOL_DEFINITIONS } from './asset_tools.js';
import { BRIDGE_TOOL_DEFINITIONS } from './bridge_tools.js';
import { SERVER_TOOL_DEFINITIONS } from './server_tools.js';
import { UTIL_TOOL_DEFINITIONS } from './util_tools.js';

export const TOOL_DEFINITION_GROUPS: Record<string, ToolDefinition[]> = {
  actor: ACTOR_TOOL_DEFINITIONS,
  asset: ASSET_TOOL_DEFINITIONS,
  util: UTIL_TOOL_DEFINITIONS,
  bridge: BRIDGE_TOOL_DEFINITIONS,
  server: SERVER_TOOL_DEFINITIONS,
};

export const ALL_TOOL_DEFINITIONS: ToolDefinition[] = [
  ...ACTOR_TOOL_DEFINITIONS,
  ...ASSET_TOOL_DEFINITIONS,
  ...UTIL_TOOL_DEFINITIONS,
  ...BRIDGE_TOOL_DEFINITIONS,
  ...SERVER_TOOL_DEFINITIONS,
];
