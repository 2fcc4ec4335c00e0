import type { LogLevel } from '../utils/logger.js';

export interface Config {
  mcp: MCPConfig;
  decipher: DecipherConfig;
  logLevel?: LogLevel;
}

export interface MCPConfig {
  name: string;
  version: string;
}

/** Environment-level settings; the run configuration file holds the rest. */
export interface DecipherConfig {
  /** Absolute path of the run configuration JSON. */
  configPath: string;
  /** Overrides `global.totalBudgetS` from the file when set. */
  totalBudgetS?: number;
  /** Overrides `global.topK` from the file when set. */
  topK?: number;
}
