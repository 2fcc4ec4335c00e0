import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ToolError } from '../errors/ToolError.js';
import type { Config } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { DecipherToolHandlers, type DecipherHandlerOptions } from './domains/decipher/index.js';
import { toolErrorToResponse } from './domains/shared/response.js';
import { buildZodShape } from './MCPServer.schema.js';
import { buildAllTools, buildHandlerMapFromRegistry } from './registry/index.js';
import type { ToolHandlerMapDependencies } from './registry/types.js';
import type { ToolArgs, ToolHandler, ToolResponse } from './types.js';

export class MCPServer {
  private readonly server: McpServer;
  private readonly tools: Tool[];
  private readonly handlers: Record<string, ToolHandler>;
  private degradedMode = false;

  constructor(
    private readonly config: Config,
    handlerOptions: DecipherHandlerOptions = {}
  ) {
    const deps: ToolHandlerMapDependencies = {
      decipherHandlers: new DecipherToolHandlers(config, handlerOptions),
    };
    this.tools = buildAllTools();
    this.handlers = buildHandlerMapFromRegistry(deps);

    this.server = new McpServer(
      { name: config.mcp.name, version: config.mcp.version },
      { capabilities: { tools: {}, logging: {} } }
    );

    this.registerTools();
  }

  get toolNames(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  private registerTools(): void {
    for (const toolDef of this.tools) {
      this.registerSingleTool(toolDef);
    }
    logger.info(`Registered ${this.tools.length} tools`);
  }

  private registerSingleTool(toolDef: Tool): void {
    const shape = buildZodShape(toolDef.inputSchema);
    const description = toolDef.description ?? toolDef.name;

    if (Object.keys(shape).length > 0) {
      this.server.tool(toolDef.name, description, shape, async (args: ToolArgs) =>
        this.executeTool(toolDef.name, args)
      );
      return;
    }

    this.server.tool(toolDef.name, description, async () => this.executeTool(toolDef.name, {}));
  }

  async executeTool(name: string, args: ToolArgs): Promise<ToolResponse> {
    const handler = this.handlers[name];
    if (!handler) {
      return toolErrorToResponse(new ToolError('NOT_FOUND', `Unknown tool: ${name}`, { toolName: name }));
    }

    try {
      return await handler(args);
    } catch (error) {
      logger.error(`Tool execution failed: ${name}`, error);
      return toolErrorToResponse(error);
    }
  }

  enterDegradedMode(reason: string): void {
    if (this.degradedMode) {
      return;
    }
    this.degradedMode = true;
    logger.setLevel('warn');
    logger.warn(`Entering degraded mode: ${reason}`);
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.success(`MCP server "${this.config.mcp.name}" connected over stdio`);
  }

  async close(): Promise<void> {
    await this.server.close();
    logger.success('MCP server closed');
  }
}
