/**
 * Log Configuration Test Suite
 *
 * Level resolution from NODE_ENV and LOG_LEVEL, and the runtime log gates.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    configure: vi.fn()
  },
  LogMode: { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3, SILENT: 4, OFF: 5 }
}));

import { LogEngine } from '@wgtechlabs/log-engine';
import {
  ConditionalLogger,
  getLogConfig,
  initializeLogConfig,
  resolveLogConfig,
  toLogMode
} from '../utils/logConfig.js';

describe('Log Configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env.NODE_ENV;
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('resolveLogConfig', () => {
    it('should follow NODE_ENV without LOG_LEVEL', () => {
      expect(resolveLogConfig('development').level).toBe('info');
      expect(resolveLogConfig('production').level).toBe('warn');
      expect(resolveLogConfig('debug').level).toBe('debug');
      expect(resolveLogConfig('test').level).toBe('info');
    });

    it('should let LOG_LEVEL name a level', () => {
      expect(resolveLogConfig('production', 'info').level).toBe('info');
      expect(resolveLogConfig('development', 'warn').level).toBe('warn');
      expect(resolveLogConfig('development', 'error')).toEqual({
        level: 'error',
        runtime: { routing: false, storage: false }
      });
      expect(resolveLogConfig('development', 'silent').level).toBe('silent');
    });

    it('should let LOG_LEVEL name a preset', () => {
      expect(resolveLogConfig('production', 'debug')).toEqual({
        level: 'debug',
        runtime: { routing: true, storage: true }
      });
      expect(resolveLogConfig('debug', 'production').level).toBe('warn');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      expect(resolveLogConfig('production', 'loud').level).toBe('warn');
    });
  });

  describe('toLogMode', () => {
    it('should map level names to LogEngine modes', () => {
      expect(toLogMode('debug')).toBe(0);
      expect(toLogMode('info')).toBe(1);
      expect(toLogMode('warn')).toBe(2);
      expect(toLogMode('error')).toBe(3);
      expect(toLogMode('silent')).toBe(4);
    });
  });

  describe('initializeLogConfig', () => {
    it('should default to development', () => {
      const config = initializeLogConfig();

      expect(config.level).toBe('info');
      expect(LogEngine.configure).toHaveBeenCalledWith({ mode: 1 });
      expect(LogEngine.info).toHaveBeenCalledWith('Log configuration initialized', {
        environment: 'development',
        level: 'info',
        customLevel: false
      });
    });

    it('should remember the active configuration', () => {
      process.env.LOG_LEVEL = 'debug';

      const config = initializeLogConfig();

      expect(getLogConfig()).toBe(config);
      expect(LogEngine.info).toHaveBeenCalledWith('Log configuration initialized', {
        environment: 'development',
        level: 'debug',
        customLevel: true
      });
    });
  });

  describe('ConditionalLogger', () => {
    it('should log routing and storage details at debug level', () => {
      process.env.LOG_LEVEL = 'debug';
      initializeLogConfig();

      ConditionalLogger.logRouting('message', { userId: 1 });
      ConditionalLogger.logStorage('insert', { collection: 'Logs' });

      expect(LogEngine.debug).toHaveBeenCalledWith('Routing: message', { userId: 1 });
      expect(LogEngine.debug).toHaveBeenCalledWith('Storage: insert', { collection: 'Logs' });
    });

    it('should stay quiet otherwise', () => {
      process.env.NODE_ENV = 'production';
      initializeLogConfig();

      ConditionalLogger.logRouting('message', { userId: 1 });
      ConditionalLogger.logStorage('insert', { collection: 'Logs' });

      expect(LogEngine.debug).not.toHaveBeenCalled();
    });
  });
});
