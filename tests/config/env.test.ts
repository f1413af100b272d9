/**
 * Unit Tests for Environment Configuration
 */

import { loadEnvConfig, getConfig, resetConfig } from '../../src/config/env.js';

describe('Environment Configuration', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  describe('loadEnvConfig', () => {
    it('should load values from the environment', () => {
      const config = loadEnvConfig();

      expect(config.STANDARDS_DIR).toBe('./standards');
      expect(config.LOG_LEVEL).toBe('error');
      expect(config.DUPLICATE_STANDARDS).toBe('warn');
      expect(config.LOAD_CONCURRENCY).toBe(2);
    });

    it('should fall back to defaults for unset or blank values', () => {
      delete process.env.STANDARDS_DIR;
      delete process.env.LOG_LEVEL;
      process.env.DUPLICATE_STANDARDS = '   ';
      delete process.env.LOAD_CONCURRENCY;

      const config = loadEnvConfig();

      expect(config.STANDARDS_DIR).toBe('./standards');
      expect(config.LOG_LEVEL).toBe('info');
      expect(config.DUPLICATE_STANDARDS).toBe('warn');
      expect(config.LOAD_CONCURRENCY).toBe(4);
    });

    it('should trim and lowercase the duplicate strategy', () => {
      process.env.DUPLICATE_STANDARDS = ' ERROR ';

      expect(loadEnvConfig().DUPLICATE_STANDARDS).toBe('error');
    });

    it('should throw for an unknown duplicate strategy', () => {
      process.env.DUPLICATE_STANDARDS = 'ignore';

      expect(() => loadEnvConfig()).toThrow(
        '[CONFIG ERROR] Invalid value for DUPLICATE_STANDARDS: "ignore"\nExpected one of: warn, error'
      );
    });

    it('should throw for a non-numeric concurrency', () => {
      process.env.LOAD_CONCURRENCY = 'many';

      expect(() => loadEnvConfig()).toThrow('[CONFIG ERROR] Invalid numeric value for LOAD_CONCURRENCY: "many"');
    });

    it('should throw for a concurrency below one', () => {
      process.env.LOAD_CONCURRENCY = '0';

      expect(() => loadEnvConfig()).toThrow('[CONFIG ERROR] LOAD_CONCURRENCY (0) must be >= 1');
    });
  });

  describe('getConfig', () => {
    it('should return singleton instance', () => {
      const config1 = getConfig();
      const config2 = getConfig();

      expect(config1).toBe(config2);
    });

    it('should reload after resetConfig', () => {
      const config1 = getConfig();
      process.env.STANDARDS_DIR = '/etc/standards';
      resetConfig();

      const config2 = getConfig();

      expect(config2).not.toBe(config1);
      expect(config2.STANDARDS_DIR).toBe('/etc/standards');
    });
  });
});
