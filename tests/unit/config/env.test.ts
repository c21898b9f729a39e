/**
 * Unit Tests: Environment Configuration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('env configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset modules to clear cached env
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.GAME_MODE_VOTING;
    delete process.env.GAME_MODES_CONFIG_PATH;
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('getEnv', () => {
    it('should use default values for optional variables', async () => {
      process.env.NODE_ENV = 'test';

      const { getEnv } = await import('../../../src/config/env');
      const env = getEnv();

      expect(env.NODE_ENV).toBe('test');
      expect(env.GAME_MODES_CONFIG_PATH).toBe('config/server.json');
      expect(env.GAME_MODE_VOTING).toBe(true);
      expect(env.LOG_LEVEL).toBeUndefined();
    });

    it('should transform boolean strings', async () => {
      process.env.GAME_MODE_VOTING = 'false';
      const { getEnv } = await import('../../../src/config/env');
      expect(getEnv().GAME_MODE_VOTING).toBe(false);
    });

    it('should accept common truthy spellings', async () => {
      process.env.GAME_MODE_VOTING = ' ON ';
      const { getEnv } = await import('../../../src/config/env');
      expect(getEnv().GAME_MODE_VOTING).toBe(true);
    });

    it('should cache the first parse', async () => {
      process.env.GAME_MODES_CONFIG_PATH = 'first.json';
      const { getEnv } = await import('../../../src/config/env');
      getEnv();
      process.env.GAME_MODES_CONFIG_PATH = 'second.json';

      expect(getEnv().GAME_MODES_CONFIG_PATH).toBe('first.json');
    });

    it('should throw CONFIG_INVALID for a bad log level', async () => {
      process.env.LOG_LEVEL = 'loud';
      const { getEnv } = await import('../../../src/config/env');

      expect(() => getEnv()).toThrow(/Environment validation failed:\n {2}- LOG_LEVEL: /);
    });
  });

  describe('resolveLogLevel', () => {
    it('should prefer an explicit LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'warn';
      const { getEnv, resolveLogLevel } = await import('../../../src/config/env');
      expect(resolveLogLevel(getEnv())).toBe('warn');
    });

    it('should stay silent under test', async () => {
      process.env.NODE_ENV = 'test';
      const { getEnv, resolveLogLevel } = await import('../../../src/config/env');
      expect(resolveLogLevel(getEnv())).toBe('silent');
    });

    it('should log info in production and debug otherwise', async () => {
      process.env.NODE_ENV = 'production';
      const { getEnv, resolveLogLevel } = await import('../../../src/config/env');
      const env = getEnv();

      expect(resolveLogLevel(env)).toBe('info');
      expect(resolveLogLevel({ ...env, NODE_ENV: 'development' })).toBe('debug');
    });
  });
});
