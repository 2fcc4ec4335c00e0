import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isLogLevel, logger, MAX_LOGGED_STRING } from '../../src/utils/logger.js';

describe('logger', () => {
  const firstLine = (): string => String(vi.mocked(console.error).mock.calls[0]?.[0]);

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLevel('debug');
  });

  afterEach(() => {
    logger.setLevel('info');
    vi.restoreAllMocks();
  });

  it('emits debug logs when level is debug', () => {
    logger.debug('debug message', { x: 1 });

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(firstLine()).toContain('[DEBUG]');
    expect(firstLine()).toContain('debug message [{"x":1}]');
  });

  it('respects level filtering and suppresses lower-priority logs', () => {
    logger.setLevel('warn');

    logger.info('hidden info');
    logger.warn('visible warn');

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(firstLine()).toContain('[WARN]');
    expect(firstLine()).toContain('visible warn');
    expect(logger.getLevel()).toBe('warn');
  });

  it('truncates long string values in structured payloads', () => {
    const ciphertext = 'A'.repeat(MAX_LOGGED_STRING + 30);
    logger.info('run', { ciphertext });

    expect(firstLine()).toContain(`"ciphertext":"${'A'.repeat(MAX_LOGGED_STRING)}…(+30 chars)"`);
  });

  it('falls back to [unserializable] for circular arguments', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    logger.info('circular', circular);

    expect(firstLine()).toContain('circular [unserializable]');
  });

  it('success logs use info-level threshold and include info prefix', () => {
    logger.setLevel('info');
    logger.success('operation completed');

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(firstLine()).toContain('[INFO]');
    expect(firstLine()).toContain('operation completed');
  });

  it('recognises level names', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
