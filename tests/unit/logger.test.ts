import { describe, it, expect } from 'vitest';
import { createComponentLogger, logger, resolveLogLevel } from '../../src/utils/logger.js';
import { buildConfig, withTestEnv } from '../../src/config/index.js';

describe('Logger', () => {
  describe('createComponentLogger', () => {
    it('should bind the component name', () => {
      const childLogger = createComponentLogger('scheme');
      expect(childLogger.bindings()).toMatchObject({ component: 'scheme' });
    });

    it('should return logger with logging methods', () => {
      const childLogger = createComponentLogger('classifier');
      expect(typeof childLogger.info).toBe('function');
      expect(typeof childLogger.warn).toBe('function');
      expect(typeof childLogger.error).toBe('function');
      expect(typeof childLogger.debug).toBe('function');
    });

    it('should inherit the root level', () => {
      expect(createComponentLogger('cli').level).toBe(logger.level);
    });
  });

  describe('logger instance', () => {
    it('should have child method', () => {
      expect(typeof logger.child).toBe('function');
    });

    it('should accept structured log calls', () => {
      expect(() => logger.info({ policy: 'ga4gh' }, 'scheme ready')).not.toThrow();
    });
  });

  describe('resolveLogLevel', () => {
    it('should use the configured level when debug is off', () => {
      expect(resolveLogLevel({ level: 'warn', debug: false })).toBe('warn');
    });

    it('should let the debug flag override the level', () => {
      expect(resolveLogLevel({ level: 'error', debug: true })).toBe('debug');
    });

    it('should prefer CONCORDANCE_DEBUG over LOG_LEVEL from the environment', async () => {
      await withTestEnv({ LOG_LEVEL: 'warn', CONCORDANCE_DEBUG: 'true' }, () => {
        expect(resolveLogLevel(buildConfig().logging)).toBe('debug');
      });
    });
  });
});
