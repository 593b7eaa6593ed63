import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';

import { getErrorMessage } from './bridge/errors.js';
import { BridgeClient } from './bridge_client.js';
import { isDebugEnabled, loadClientConfig } from './config.js';
import { ValidationError } from './validation.js';
import { MCP_SERVER_INFO } from './version.js';

import { createActionToolHandlers } from './tools/actions.js';
import { createBridgeToolHandlers } from './tools/bridge.js';
import { ALL_TOOL_DEFINITIONS } from './tools/definitions/all_tools.js';
import { createServerInfoToolHandlers } from './tools/server_info_tool.js';

import type { BridgeCaller, ServerContext } from './tools/context.js';
import type { ToolHandler, ToolResponse } from './tools/types.js';

const DEBUG_MODE = isDebugEnabled();

type McpToolResponse = {
  content: { type: 'text'; text: string }[];
  isError: boolean;
};

export interface EditorBridgeMcpServerConfig {
  /** Defaults to a `BridgeClient` configured from the environment. */
  client?: BridgeCaller;
}

function invalidArgs(tool: string, error: unknown): ToolResponse | null {
  if (!(error instanceof ValidationError)) return null;
  return {
    ok: false,
    summary: `Invalid arguments: ${error.message}`,
    details: { tool, field: error.field, receivedType: error.receivedType },
    logs: [],
  };
}

function toMcpResponse(result: ToolResponse): McpToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    isError: !result.ok,
  };
}

export class EditorBridgeMcpServer {
  private server: Server;
  private readonly bridgeClient: BridgeCaller;
  private toolHandlers: Record<string, ToolHandler> = {};

  constructor(config: EditorBridgeMcpServerConfig = {}) {
    this.bridgeClient = config.client ?? new BridgeClient(loadClientConfig());

    this.server = new Server(
      { name: MCP_SERVER_INFO.name, version: MCP_SERVER_INFO.version },
      { capabilities: { tools: {} } },
    );

    this.toolHandlers = this.createToolHandlers();
    this.setupToolHandlers();

    this.server.onerror = (error) => console.error('[MCP Error]', error);
  }

  get toolNames(): string[] {
    return Object.keys(this.toolHandlers).sort((a, b) => a.localeCompare(b));
  }

  private logDebug(message: string): void {
    if (DEBUG_MODE) console.error(`[DEBUG] ${message}`);
  }

  private createToolHandlers(): Record<string, ToolHandler> {
    const ctx: ServerContext = {
      logDebug: (m) => this.logDebug(m),
      getBridgeClient: () => this.bridgeClient,
    };

    return {
      ...createActionToolHandlers(ctx),
      ...createBridgeToolHandlers(ctx),
      ...createServerInfoToolHandlers(ctx),
    };
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: ALL_TOOL_DEFINITIONS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const result = await this.callTool(
        request.params.name,
        request.params.arguments ?? {},
      );
      return toMcpResponse(result);
    });
  }

  /**
   * Runs one tool. Unknown tools raise `MethodNotFound`; every other failure
   * becomes an `ok: false` response.
   */
  async callTool(tool: string, args: unknown): Promise<ToolResponse> {
    const handler = this.toolHandlers[tool];
    if (!handler)
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${tool}`);

    try {
      return await handler(args);
    } catch (error) {
      const invalid = invalidArgs(tool, error);
      if (invalid) return invalid;

      const message = getErrorMessage(error);
      return {
        ok: false,
        summary: message,
        details: {
          tool,
          error: {
            name: error instanceof Error ? error.name : 'Error',
            message,
          },
        },
        logs: [],
      };
    }
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    process.once('SIGINT', () => {
      this.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('[SERVER] Shutdown failed:', getErrorMessage(error));
          process.exit(1);
        },
      );
    });

    console.error(
      `${MCP_SERVER_INFO.name} server running on stdio (bridge ${this.bridgeClient.endpoint})`,
    );
  }
}
