import { beforeEach, describe, expect, it, vi } from 'vitest';

interface RecordedServer {
  info: unknown;
  tools: Array<{ name: string; handler: unknown }>;
  connect: (...args: unknown[]) => Promise<unknown>;
  close: () => Promise<unknown>;
}

const mocks = vi.hoisted(() => {
  const instances: RecordedServer[] = [];
  return {
    instances,
    logger: {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      success: vi.fn(),
      setLevel: vi.fn(),
    },
  };
});

vi.mock('@modelcontextprotocol/sdk/server/mcp.js', () => ({
  McpServer: class {
    tools: Array<{ name: string; handler: unknown }> = [];
    connect = vi.fn(async () => undefined);
    close = vi.fn(async () => undefined);

    constructor(public readonly info: unknown) {
      mocks.instances.push(this);
    }

    tool(...args: unknown[]) {
      this.tools.push({ name: String(args[0]), handler: args.at(-1) });
    }
  },
}));

vi.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: class StdioServerTransport {},
}));

vi.mock('../../src/utils/logger.js', () => ({
  logger: mocks.logger,
}));

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { MCPServer } from '../../src/server/MCPServer.js';
import type { ToolArgs, ToolResponse } from '../../src/server/types.js';
import type { Config } from '../../src/types/index.js';
import { jsonOf } from './helpers/responses.js';

type RegisteredHandler = (args: ToolArgs) => Promise<ToolResponse>;

function isHandler(value: unknown): value is RegisteredHandler {
  return typeof value === 'function';
}

const config: Config = {
  mcp: { name: 'test-server', version: '1.0.0' },
  decipher: { configPath: '/srv/decipher.json' },
};

function createServer() {
  const readConfig = vi.fn(async () => ({ activeStrategies: ['rotN'] }));
  const server = new MCPServer(config, { readConfig, clock: () => 0 });
  const recorded = mocks.instances.at(-1);
  if (!recorded) {
    throw new Error('McpServer was not constructed');
  }
  return { server, recorded, readConfig };
}

function registeredHandler(recorded: RecordedServer, name: string): RegisteredHandler {
  const handler = recorded.tools.find((tool) => tool.name === name)?.handler;
  if (!isHandler(handler)) {
    throw new Error(`tool ${name} was not registered`);
  }
  return handler;
}

describe('MCPServer', () => {
  beforeEach(() => {
    mocks.instances.length = 0;
  });

  it('registers every decipher tool with the SDK server', () => {
    const { server, recorded } = createServer();
    expect(recorded.info).toEqual({ name: 'test-server', version: '1.0.0' });
    expect(server.toolNames).toEqual(['brute_decipher', 'list_strategies', 'naming_hint']);
    expect(recorded.tools.map((tool) => tool.name)).toEqual(server.toolNames);
    expect(mocks.logger.info).toHaveBeenCalledWith('Registered 3 tools');
  });

  it('routes registered tool calls to the handlers', async () => {
    const { recorded, readConfig } = createServer();
    const res = await registeredHandler(recorded, 'brute_decipher')({ ciphertext: 'Uryyb' });

    expect(readConfig).toHaveBeenCalledWith('/srv/decipher.json');
    expect(jsonOf(res)).toMatchObject({
      success: true,
      candidates: [{ rank: 1, strategy: 'rotN', provenance: 'k=13', text: 'Hello' }],
    });
  });

  it('returns validation failures as structured, correctable responses', async () => {
    const { recorded } = createServer();
    const res = await registeredHandler(recorded, 'brute_decipher')({});

    expect(res.isError).toBeUndefined();
    expect(jsonOf(res)).toEqual({
      success: false,
      code: 'VALIDATION',
      message: 'Invalid arguments for brute_decipher',
      tool: 'brute_decipher',
      details: { issues: ['ciphertext: Required'] },
    });
    expect(mocks.logger.error).toHaveBeenCalledWith('Tool execution failed: brute_decipher', expect.any(Error));
  });

  it('reports unknown tools as a correctable NOT_FOUND', async () => {
    const { server } = createServer();
    const res = await server.executeTool('nope', {});
    expect(res.isError).toBeUndefined();
    expect(jsonOf(res)).toEqual({
      success: false,
      code: 'NOT_FOUND',
      message: 'Unknown tool: nope',
      tool: 'nope',
    });
  });

  it('connects over stdio and closes', async () => {
    const { server, recorded } = createServer();

    await server.start();
    expect(recorded.connect).toHaveBeenCalledTimes(1);
    expect(recorded.connect).toHaveBeenCalledWith(expect.any(StdioServerTransport));

    await server.close();
    expect(recorded.close).toHaveBeenCalledTimes(1);
    expect(mocks.logger.success).toHaveBeenCalledWith('MCP server closed');
  });

  it('enters degraded mode only once', () => {
    const { server } = createServer();
    server.enterDegradedMode('too many failures');
    server.enterDegradedMode('again');

    expect(mocks.logger.setLevel).toHaveBeenCalledTimes(1);
    expect(mocks.logger.setLevel).toHaveBeenCalledWith('warn');
    expect(mocks.logger.warn).toHaveBeenCalledWith('Entering degraded mode: too many failures');
  });
});
