import type { z } from 'zod';
import type { Deadline } from './deadline.js';

export const STRATEGY_NAMES = ['base64', 'base58', 'base45', 'base91', 'super_rot', 'rotN'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/** One scored plaintext hypothesis. Never mutated after creation. */
export interface Candidate {
  readonly strategyName: StrategyName;
  readonly provenance: string;
  readonly text: string;
  readonly score: number;
}

/** Options every strategy accepts. */
export type BaseStrategyOptions = {
  budgetS: number;
  /** Literal input replacing the ciphertext; `%c` expands to the ciphertext. */
  textToDecipher?: string | undefined;
};

export interface StrategyContext {
  readonly deadline: Deadline;
}

export interface StrategyDefinition<O extends BaseStrategyOptions> {
  name: StrategyName;
  description: string;
  options: z.ZodType<O, z.ZodTypeDef, unknown>;
  run(ciphertext: string, options: O, context: StrategyContext): Candidate[];
}

/** A strategy bound to validated options, ready for the orchestrator. */
export interface PreparedStrategy {
  readonly name: StrategyName;
  readonly budgetS: number;
  readonly options: object;
  run(ciphertext: string, context: StrategyContext): Candidate[];
}

export interface StrategyRegistration {
  readonly name: StrategyName;
  readonly description: string;
  /** Validate raw options (defaults filled in); throws `ConfigError` on bad input. */
  prepare(rawOptions: unknown): PreparedStrategy;
}
