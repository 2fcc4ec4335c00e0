import type { ToolRegistration } from '../../registry/types.js';
import { toolLookup } from '../../registry/types.js';
import { decipherTools } from './definitions.js';

const t = toolLookup(decipherTools);

export const decipherRegistrations: readonly ToolRegistration[] = [
  { tool: t('brute_decipher'), domain: 'decipher', bind: (d) => (a) => d.decipherHandlers.handleBruteDecipher(a) },
  { tool: t('list_strategies'), domain: 'decipher', bind: (d) => () => d.decipherHandlers.handleListStrategies() },
  { tool: t('naming_hint'), domain: 'decipher', bind: (d) => (a) => d.decipherHandlers.handleNamingHint(a) },
];
