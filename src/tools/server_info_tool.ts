import process from 'node:process';

import { MCP_SERVER_INFO } from '../version.js';
import { asRecord } from '../validation.js';

import {
  ALL_TOOL_DEFINITIONS,
  TOOL_DEFINITION_GROUPS,
} from './definitions/all_tools.js';

import type { ServerContext } from './context.js';
import type { ToolHandler, ToolResponse } from './types.js';

export function createServerInfoToolHandlers(
  ctx: ServerContext,
): Record<string, ToolHandler> {
  return {
    server_info: async (args: unknown): Promise<ToolResponse> => {
      asRecord(args, 'args');

      const groups: Record<string, number> = {};
      let toolCount = 0;
      for (const [groupName, defs] of Object.entries(TOOL_DEFINITION_GROUPS)) {
        groups[groupName] = defs.length;
        toolCount += defs.length;
      }

      return {
        ok: true,
        summary: `${MCP_SERVER_INFO.name} ${MCP_SERVER_INFO.version}`,
        details: {
          server: {
            name: MCP_SERVER_INFO.name,
            version: MCP_SERVER_INFO.version,
          },
          runtime: {
            pid: process.pid,
            platform: process.platform,
            node: process.version,
          },
          bridge: {
            endpoint: ctx.getBridgeClient().endpoint,
          },
          tools: {
            count: toolCount,
            groups,
            names: ALL_TOOL_DEFINITIONS.map((t) => t.name).sort((a, b) =>
              a.localeCompare(b),
            ),
          },
        },
      };
    },
  };
}
