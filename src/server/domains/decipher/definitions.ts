import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { STRATEGY_NAMES } from '../../../modules/strategies/types.js';

export const decipherTools: Tool[] = [
  {
    name: 'brute_decipher',
    description:
      'Brute-force recovery of plaintext hidden behind unknown text encodings (Base64/32/45/58/91, hex, ' +
      'ascii85/base85) and shift ciphers (ROT-N, progressive shift). Runs the configured strategies under a ' +
      'time budget and returns a deduplicated, diversity-ranked candidate list with provenance.',
    inputSchema: {
      type: 'object',
      properties: {
        ciphertext: {
          type: 'string',
          description: 'Input to decipher (noisy or obfuscated text is fine)',
        },
        strategies: {
          type: 'array',
          items: { type: 'string', enum: [...STRATEGY_NAMES] },
          description: 'Strategies to run, in order. Defaults to the configured active list.',
        },
        totalBudgetS: {
          type: 'number',
          description: 'Wall-clock budget for the whole run, in seconds',
        },
        topK: {
          type: 'number',
          description: 'Number of ranked candidates to return',
        },
        perStrategyCap: {
          type: 'number',
          description: 'Most candidates any one strategy may contribute (default 5)',
        },
        promoteTopPerStrategy: {
          type: 'boolean',
          description: "Put each strategy's best candidate first (default true)",
        },
        strategyOptions: {
          type: 'object',
          description:
            'Per-strategy option overrides keyed by strategy name, e.g. {"rotN": {"n": "all"}}. ' +
            'Call list_strategies for the available options and their defaults.',
          additionalProperties: { type: 'object' },
        },
      },
      required: ['ciphertext'],
    },
  },
  {
    name: 'list_strategies',
    description: 'List the available decipher strategies with their descriptions and default options.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'naming_hint',
    description:
      'Suggest an identifier-style rendering (snake_case or lowercase) of a recovered token, with the ' +
      'n-gram and wordness evidence behind it.',
    inputSchema: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'Candidate text, e.g. a decoded flag body',
        },
      },
      required: ['text'],
    },
  },
];
