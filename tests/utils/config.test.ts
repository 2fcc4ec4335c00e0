import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { join } from 'node:path';
import { getConfig, projectRoot, validateConfig } from '../../src/utils/config.js';

describe('config utilities', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns sane defaults when environment is empty', () => {
    const config = getConfig({});
    expect(config.mcp).toEqual({ name: 'brute-decipher', version: '0.1.0' });
    expect(config.decipher.configPath).toBe(join(projectRoot, 'config/decipher.json'));
    expect(config.decipher.totalBudgetS).toBeUndefined();
    expect(config.decipher.topK).toBeUndefined();
    expect(config.logLevel).toBeUndefined();
  });

  it('reads overrides from the environment', () => {
    const config = getConfig({
      DECIPHER_TOTAL_BUDGET_S: '2.5',
      DECIPHER_TOP_K: '3',
      MCP_SERVER_NAME: 'decipher-test',
      LOG_LEVEL: 'debug',
    });
    expect(config.decipher.totalBudgetS).toBe(2.5);
    expect(config.decipher.topK).toBe(3);
    expect(config.mcp.name).toBe('decipher-test');
    expect(config.logLevel).toBe('debug');
  });

  it('keeps absolute config paths as given', () => {
    expect(getConfig({ DECIPHER_CONFIG_PATH: '/etc/decipher.json' }).decipher.configPath).toBe('/etc/decipher.json');
  });

  it('falls back to defaults for invalid fields only', () => {
    const config = getConfig({ DECIPHER_TOP_K: 'many', LOG_LEVEL: 'loud', MCP_SERVER_NAME: 'kept' });
    expect(config.decipher.topK).toBeUndefined();
    expect(config.logLevel).toBeUndefined();
    expect(config.mcp.name).toBe('kept');
    expect(console.error).toHaveBeenCalledWith('[Config] Falling back to safe defaults for invalid fields');
  });

  it('validateConfig reports out-of-range settings', () => {
    const config = getConfig({ DECIPHER_TOTAL_BUDGET_S: '-1', DECIPHER_TOP_K: '0', MCP_SERVER_NAME: ' ' });

    const result = validateConfig(config);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'DECIPHER_TOTAL_BUDGET_S must be non-negative',
      'DECIPHER_TOP_K must be at least 1',
      'MCP_SERVER_NAME must not be empty',
    ]);
  });

  it('validateConfig accepts the defaults', () => {
    expect(validateConfig(getConfig({}))).toEqual({ valid: true, errors: [] });
  });
});
