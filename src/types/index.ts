export type { Config, MCPConfig, DecipherConfig } from './config.js';
