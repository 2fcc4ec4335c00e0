/**
 * Central tool registry.
 *
 * Aggregates every domain manifest into a flat array of ToolRegistration
 * objects; the server derives both its tool list and its handler map from it.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolHandlerMapDependencies, ToolRegistration } from './types.js';
import type { ToolHandler } from '../types.js';

import { decipherRegistrations } from '../domains/decipher/manifest.js';

export const ALL_REGISTRATIONS: readonly ToolRegistration[] = [
  ...decipherRegistrations,
];

/** Flat list of all Tool definitions. */
export function buildAllTools(): Tool[] {
  return ALL_REGISTRATIONS.map(r => r.tool);
}

/** Handler map keyed by tool name. */
export function buildHandlerMapFromRegistry(deps: ToolHandlerMapDependencies): Record<string, ToolHandler> {
  return Object.fromEntries(
    ALL_REGISTRATIONS.map((r): [string, ToolHandler] => [r.tool.name, r.bind(deps)]),
  );
}
