import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolArgs, ToolResponse } from '../types.js';
import type { DecipherToolHandlers } from '../domains/decipher/index.js';

/** Domain names for tool grouping. */
export type ToolDomain = 'decipher';

/**
 * Dependency container passed to tool handler bindings.
 * Lives here rather than in MCPServer.ts to avoid circular imports.
 */
export interface ToolHandlerMapDependencies {
  decipherHandlers: DecipherToolHandlers;
}

/**
 * Single source of truth for a tool: definition + domain + handler binding.
 *
 * Each domain's manifest.ts exports an array of these; the central registry
 * aggregates them.
 */
export interface ToolRegistration {
  /** Full MCP tool definition (name, description, inputSchema). */
  readonly tool: Tool;
  /** Domain this tool belongs to. */
  readonly domain: ToolDomain;
  /** Creates a handler function given the handler dependencies. */
  readonly bind: (deps: ToolHandlerMapDependencies) => (args: ToolArgs) => Promise<ToolResponse>;
}

/**
 * Helper: create a name-based lookup from a Tool array.
 * Throws at module load time if a tool name is missing.
 */
export function toolLookup(tools: readonly Tool[]): (name: string) => Tool {
  const map = new Map(tools.map(t => [t.name, t]));
  return (name: string): Tool => {
    const tool = map.get(name);
    if (!tool) throw new Error(`[registry] Tool definition not found: "${name}"`);
    return tool;
  };
}
