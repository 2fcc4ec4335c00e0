import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../../errors/ConfigError.js';
import { HINT_MODES } from '../scoring/hint.js';
import { getStrategy } from '../strategies/registry.js';
import { STRATEGY_NAMES, type PreparedStrategy } from '../strategies/types.js';

const GlobalRunConfigSchema = z
  .object({
    totalBudgetS: z.number().finite().min(0).default(600),
    topK: z.number().int().min(1).default(10),
    perStrategyCap: z.number().int().min(1).default(5),
    promoteTopPerStrategy: z.boolean().default(true),
    showHint: z.enum(HINT_MODES).default('auto'),
  })
  .strict();

const RunConfigFileSchema = z
  .object({
    activeStrategies: z.array(z.string()).min(1).default([...STRATEGY_NAMES]),
    strategies: z.record(z.record(z.unknown())).default({}),
    global: GlobalRunConfigSchema.default({}),
  })
  .strict();

export type GlobalRunConfig = z.infer<typeof GlobalRunConfigSchema>;
export type RunConfigFile = z.infer<typeof RunConfigFileSchema>;

/** Fully validated configuration for one run. */
export interface RunConfig {
  strategies: PreparedStrategy[];
  global: GlobalRunConfig;
}

/** Adjustments layered over the file: environment values, tool arguments. */
export interface RunConfigOverrides {
  activeStrategies?: string[];
  strategyOptions?: Record<string, Record<string, unknown>>;
  global?: Partial<GlobalRunConfig>;
}

/**
 * Validate a parsed configuration document against the static strategy
 * registry. Unknown strategy names and invalid options throw `ConfigError`.
 */
export function parseRunConfig(raw: unknown, overrides: RunConfigOverrides = {}): RunConfig {
  const parsed = RunConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError('Invalid run configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  const file = parsed.data;

  // options keyed by an unknown strategy name are rejected too
  for (const name of [...Object.keys(file.strategies), ...Object.keys(overrides.strategyOptions ?? {})]) {
    getStrategy(name);
  }

  const active = overrides.activeStrategies ?? file.activeStrategies;
  if (active.length === 0) {
    throw new ConfigError('At least one strategy must be active');
  }

  const strategies = active.map((name) =>
    getStrategy(name).prepare({
      ...file.strategies[name],
      ...overrides.strategyOptions?.[name],
    })
  );

  const global = GlobalRunConfigSchema.safeParse({
    ...file.global,
    ...Object.fromEntries(Object.entries(overrides.global ?? {}).filter(([, value]) => value !== undefined)),
  });
  if (!global.success) {
    throw new ConfigError('Invalid global run options', {
      issues: global.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return { strategies, global: global.data };
}

export async function readRunConfigFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Config file not found or unreadable: ${path}`, { path }, error instanceof Error ? error : undefined);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${path}`, { path }, error instanceof Error ? error : undefined);
  }
}

export async function loadRunConfig(path: string, overrides: RunConfigOverrides = {}): Promise<RunConfig> {
  return parseRunConfig(await readRunConfigFile(path), overrides);
}
