import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, CommandRegistry, Tool } from '@kvctl/commands-core';
import { ConsoleLogger, type ILogger, logError, logEvent } from '@kvctl/core';
import { createCommandRegistry } from './registry.js';
import { VERSION } from './version.js';

/**
 * MCP server exposing every registered command's tools over stdio.
 *
 * Tool names are prefixed with their command, e.g. `kv_key_get`.
 * @public
 */
export class KvctlMcpServer {
  private readonly server: Server;

  public constructor(
    private readonly registry: CommandRegistry = createCommandRegistry(),
    private readonly logger: ILogger = new ConsoleLogger('[kvctl:mcp]'),
  ) {
    this.server = new Server(
      {
        name: 'kvctl',
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );
    this.setupRequestHandlers();
  }

  public listTools(): Tool[] {
    return this.registry.getAllMCPDefinitions();
  }

  /**
   * Executes a prefixed tool.
   * @param name - `<command>_<tool>`
   * @param args - Tool arguments
   */
  public async callTool(
    name: string,
    args: Record<string, unknown> = {},
  ): Promise<CallToolResult> {
    logEvent('debug', 'mcp:call_tool', { name });
    try {
      return await this.registry.callTool(name, args);
    } catch (error) {
      logError('mcp:call_tool', error, { name });
      this.logger.error(`Tool ${name} failed`, error);
      return {
        content: [
          {
            type: 'text',
            text: `Tool ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
          },
        ],
        isError: true,
      };
    }
  }

  public async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    const tools = this.listTools().length;
    // stdout belongs to the transport; ConsoleLogger writes to stderr
    this.logger.info('MCP server started', { tools });
    logEvent('info', 'mcp:started', { tools });
  }

  public async close(): Promise<void> {
    await this.server.close();
    logEvent('info', 'mcp:closed');
  }

  private setupRequestHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }
}
