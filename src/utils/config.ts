import { fileURLToPath } from 'url';
import { dirname, isAbsolute, join } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { Config } from '../types/index.js';
import { isLogLevel } from './logger.js';

const currentFilename = fileURLToPath(import.meta.url);
const currentDirname = dirname(currentFilename);
export const projectRoot = join(currentDirname, '..', '..');

const envPath = join(projectRoot, '.env');
const result = dotenvConfig({ path: envPath, quiet: true });

if (result.error && process.env.DEBUG === 'true') {
  console.error(`[Config] No .env loaded from ${envPath}: ${result.error.message}`);
  console.error('[Config] Will use environment variables or defaults');
} else if (process.env.DEBUG === 'true') {
  console.error(`[Config] Successfully loaded .env from: ${envPath}`);
}

/* ---------- Zod schemas for environment-based config ---------- */

const envInt = () =>
  z.string().optional()
    .transform((v) => (v ? Number(v) : undefined))
    .pipe(z.number().int().finite().optional());

const envNumber = () =>
  z.string().optional()
    .transform((v) => (v ? Number(v) : undefined))
    .pipe(z.number().finite().optional());

const ConfigSchema = z.object({
  DECIPHER_CONFIG_PATH: z.string().optional().default('config/decipher.json'),
  DECIPHER_TOTAL_BUDGET_S: envNumber(),
  DECIPHER_TOP_K: envInt(),

  MCP_SERVER_NAME: z.string().optional().default('brute-decipher'),
  MCP_SERVER_VERSION: z.string().optional().default('0.1.0'),

  LOG_LEVEL: z.string().optional().refine((v) => v === undefined || isLogLevel(v), {
    message: 'expected one of debug, info, warn, error',
  }),
});

type EnvConfig = z.infer<typeof ConfigSchema>;

/**
 * Parse the environment, dropping fields that fail validation so their
 * defaults apply instead.
 */
function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (parsed.success) {
    return parsed.data;
  }

  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  const issues = parsed.error.issues.map((i) => `  ${i.path.join('.')}: ${i.message}`);
  console.error(`[Config] Validation errors:\n${issues.join('\n')}`);
  console.error('[Config] Falling back to safe defaults for invalid fields');

  const sanitized = Object.fromEntries(Object.entries(env).filter(([key]) => !invalid.has(key)));
  return ConfigSchema.parse(sanitized);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = parseEnv(env);

  const configPath = isAbsolute(parsed.DECIPHER_CONFIG_PATH)
    ? parsed.DECIPHER_CONFIG_PATH
    : join(projectRoot, parsed.DECIPHER_CONFIG_PATH);

  return {
    mcp: {
      name: parsed.MCP_SERVER_NAME,
      version: parsed.MCP_SERVER_VERSION,
    },
    decipher: {
      configPath,
      totalBudgetS: parsed.DECIPHER_TOTAL_BUDGET_S,
      topK: parsed.DECIPHER_TOP_K,
    },
    logLevel: isLogLevel(parsed.LOG_LEVEL) ? parsed.LOG_LEVEL : undefined,
  };
}

export function validateConfig(config: Config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.decipher.totalBudgetS !== undefined && config.decipher.totalBudgetS < 0) {
    errors.push('DECIPHER_TOTAL_BUDGET_S must be non-negative');
  }

  if (config.decipher.topK !== undefined && config.decipher.topK < 1) {
    errors.push('DECIPHER_TOP_K must be at least 1');
  }

  if (!config.mcp.name.trim()) {
    errors.push('MCP_SERVER_NAME must not be empty');
  }

  return { valid: errors.length === 0, errors };
}
