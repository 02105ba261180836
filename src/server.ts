import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { prepareContext, type ServerContext } from './context.js';
import { DocMirrorError, ErrorCode, ToolError, toError } from './errors/index.js';
import { LifecycleManager, type LifecycleOptions } from './lifecycle/index.js';
import { callTool, listAllTools } from './tools/index.js';

/**
 * Documentation Mirror MCP Server
 * Exposes the archive query tools over the Model Context Protocol
 */
export class DocMirrorMCPServer {
  private server: Server;
  private logger: Logger;
  private config: Config;
  private context: ServerContext;
  private lifecycle: LifecycleManager;
  private transport?: Transport;

  constructor(config: Config, context: ServerContext, logger: Logger, lifecycleOptions?: LifecycleOptions) {
    this.config = config;
    this.context = context;
    this.logger = logger;

    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.lifecycle = new LifecycleManager(logger, lifecycleOptions);

    this.setupLifecycleHooks();
    this.setupMCPHandlers();
  }

  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        archivePath: this.context.archivePath,
      });
    });

    this.lifecycle.onStartup('prepare-index', async () => {
      await prepareContext(this.context);
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.transport.close();
      }
    });
  }

  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolName = request.params.name;
      const args = request.params.arguments;

      this.logger.debug('Received call_tool request', { tool: toolName, args });

      try {
        return await callTool(this.context, toolName, args);
      } catch (error) {
        const failure = error instanceof DocMirrorError
          ? error
          : new ToolError(
            `Failed to execute tool ${toolName}`,
            ErrorCode.TOOL_EXECUTION_ERROR,
            { tool: toolName },
            toError(error)
          );
        this.logger.error('Failed to call tool', failure, { tool: toolName });
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              error: `Failed to execute tool ${toolName}`,
              code: failure.code,
              message: failure.originalError?.message ?? failure.message,
            }, null, 2),
          }],
          isError: true,
        };
      }
    });
  }

  /**
   * Run the startup hooks and connect a transport. Without one, the
   * configured transport is created.
   */
  async start(transport?: Transport): Promise<void> {
    try {
      await this.lifecycle.startup();

      if (transport) {
        this.transport = transport;
      } else if (this.config.mcp.transport === 'stdio') {
        this.logger.info('Starting MCP server with stdio transport');
        this.transport = new StdioServerTransport();
      } else {
        throw new Error(`Unsupported transport: ${this.config.mcp.transport}`);
      }

      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', toError(error));
      throw error;
    }
  }

  getServer(): Server {
    return this.server;
  }

  getLifecycle(): LifecycleManager {
    return this.lifecycle;
  }
}
