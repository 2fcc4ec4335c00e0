import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../../../src/errors/ConfigError.js';
import { loadRunConfig, parseRunConfig, readRunConfigFile } from '../../../src/modules/pipeline/runConfig.js';
import { STRATEGY_NAMES } from '../../../src/modules/strategies/types.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../../config/decipher.json', import.meta.url));

describe('parseRunConfig', () => {
  it('fills in defaults for an empty document', () => {
    const config = parseRunConfig({});
    expect(config.strategies.map((strategy) => strategy.name)).toEqual([...STRATEGY_NAMES]);
    expect(config.global).toEqual({
      totalBudgetS: 600,
      topK: 10,
      perStrategyCap: 5,
      promoteTopPerStrategy: true,
      showHint: 'auto',
    });
  });

  it('keeps the configured strategy order and options', () => {
    const config = parseRunConfig({
      activeStrategies: ['rotN', 'base64'],
      strategies: { rotN: { n: 7, budgetS: 2 } },
    });
    expect(config.strategies.map((strategy) => strategy.name)).toEqual(['rotN', 'base64']);
    expect(config.strategies[0]?.budgetS).toBe(2);
    expect(config.strategies[0]?.options).toMatchObject({ n: 7 });
  });

  it('rejects an unknown active strategy', () => {
    expect(() => parseRunConfig({ activeStrategies: ['base64', 'vigenere'] })).toThrow('Unknown strategy "vigenere"');
  });

  it('rejects options for an unknown strategy even when inactive', () => {
    expect(() => parseRunConfig({ activeStrategies: ['rotN'], strategies: { caesar: {} } })).toThrow(ConfigError);
  });

  it('rejects invalid strategy options', () => {
    expect(() => parseRunConfig({ strategies: { rotN: { budgetS: -1 } } })).toThrow(
      'Invalid options for strategy "rotN"'
    );
  });

  it('rejects unknown top-level keys', () => {
    try {
      parseRunConfig({ activeStrategies: ['rotN'], verbose: true });
      expect.unreachable('parseRunConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toBe('Invalid run configuration');
        expect(error.code).toBe('VALIDATION');
      }
    }
  });

  it('layers overrides over the document', () => {
    const config = parseRunConfig(
      { activeStrategies: ['base64', 'rotN'], strategies: { rotN: { n: 3 } }, global: { topK: 4 } },
      {
        activeStrategies: ['rotN'],
        strategyOptions: { rotN: { n: 'all' } },
        global: { topK: undefined, totalBudgetS: 30 },
      }
    );
    expect(config.strategies.map((strategy) => strategy.name)).toEqual(['rotN']);
    expect(config.strategies[0]?.options).toMatchObject({ n: 'all' });
    expect(config.global.topK).toBe(4);
    expect(config.global.totalBudgetS).toBe(30);
  });

  it('rejects an empty active list from overrides', () => {
    expect(() => parseRunConfig({}, { activeStrategies: [] })).toThrow('At least one strategy must be active');
  });

  it('rejects invalid global overrides', () => {
    expect(() => parseRunConfig({}, { global: { topK: 0 } })).toThrow('Invalid global run options');
  });
});

describe('run config files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'decipher-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'missing.json');
    await expect(readRunConfigFile(path)).rejects.toThrow(`Config file not found or unreadable: ${path}`);
  });

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "activeStrategies": [', 'utf8');
    await expect(readRunConfigFile(path)).rejects.toThrow(`Config file is not valid JSON: ${path}`);
  });

  it('loads and validates a file with overrides', async () => {
    const path = join(dir, 'run.json');
    await writeFile(path, JSON.stringify({ activeStrategies: ['base45', 'base91'] }), 'utf8');
    const config = await loadRunConfig(path, { global: { showHint: 'never' } });
    expect(config.strategies.map((strategy) => strategy.name)).toEqual(['base45', 'base91']);
    expect(config.global.showHint).toBe('never');
  });

  it('loads the shipped configuration', async () => {
    const config = await loadRunConfig(SHIPPED_CONFIG);
    expect(config.strategies.map((strategy) => [strategy.name, strategy.budgetS])).toEqual([
      ['base64', 5],
      ['base58', 5],
      ['base45', 5],
      ['base91', 5],
      ['super_rot', 60],
      ['rotN', 1],
    ]);
    expect(config.global.totalBudgetS).toBe(600);
  });
});
