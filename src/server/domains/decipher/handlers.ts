import { z } from 'zod';
import { ToolError } from '../../../errors/ToolError.js';
import { decipher } from '../../../modules/pipeline/decipher.js';
import { readRunConfigFile, parseRunConfig } from '../../../modules/pipeline/runConfig.js';
import { ngramHits, snakeFromCamel, wordnessScore } from '../../../modules/scoring/fitness.js';
import { namingHint } from '../../../modules/scoring/hint.js';
import type { Clock } from '../../../modules/strategies/deadline.js';
import { listStrategies } from '../../../modules/strategies/registry.js';
import type { Config } from '../../../types/index.js';
import type { ToolArgs, ToolResponse } from '../../types.js';
import { asDecipherResponse, asJsonResponse } from '../shared/response.js';

const BruteDecipherArgsSchema = z.object({
  ciphertext: z.string().min(1),
  strategies: z.array(z.string()).min(1).optional(),
  totalBudgetS: z.number().finite().min(0).optional(),
  topK: z.number().int().min(1).optional(),
  perStrategyCap: z.number().int().min(1).optional(),
  promoteTopPerStrategy: z.boolean().optional(),
  strategyOptions: z.record(z.record(z.unknown())).optional(),
});

const NamingHintArgsSchema = z.object({
  text: z.string(),
});

function parseArgs<T>(toolName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: ToolArgs): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new ToolError('VALIDATION', `Invalid arguments for ${toolName}`, {
      toolName,
      details: {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      },
    });
  }
  return parsed.data;
}

export interface DecipherHandlerOptions {
  /** Reads the run configuration document; defaults to the JSON file at `config.decipher.configPath`. */
  readConfig?: (path: string) => Promise<unknown>;
  clock?: Clock;
}

export class DecipherToolHandlers {
  private readonly readConfig: (path: string) => Promise<unknown>;
  private readonly clock?: Clock;

  constructor(
    private readonly config: Config,
    options: DecipherHandlerOptions = {}
  ) {
    this.readConfig = options.readConfig ?? readRunConfigFile;
    this.clock = options.clock;
  }

  async handleBruteDecipher(args: ToolArgs): Promise<ToolResponse> {
    const input = parseArgs('brute_decipher', BruteDecipherArgsSchema, args);
    const document = await this.readConfig(this.config.decipher.configPath);

    const runConfig = parseRunConfig(document, {
      activeStrategies: input.strategies,
      strategyOptions: input.strategyOptions,
      global: {
        totalBudgetS: input.totalBudgetS ?? this.config.decipher.totalBudgetS,
        topK: input.topK ?? this.config.decipher.topK,
        perStrategyCap: input.perStrategyCap,
        promoteTopPerStrategy: input.promoteTopPerStrategy,
      },
    });

    return asDecipherResponse(decipher(input.ciphertext, runConfig, this.clock));
  }

  async handleListStrategies(): Promise<ToolResponse> {
    return asJsonResponse({
      success: true,
      strategies: listStrategies().map((registration) => ({
        name: registration.name,
        description: registration.description,
        defaults: registration.prepare({}).options,
      })),
    });
  }

  async handleNamingHint(args: ToolArgs): Promise<ToolResponse> {
    const { text } = parseArgs('naming_hint', NamingHintArgsSchema, args);
    const snake = snakeFromCamel(text);

    return asJsonResponse({
      success: true,
      text,
      hint: namingHint(text) ?? null,
      evidence: {
        snake,
        ngramHits: ngramHits(text),
        snakeNgramHits: ngramHits(snake),
        wordness: wordnessScore(text),
        snakeWordness: wordnessScore(snake),
      },
    });
  }
}
