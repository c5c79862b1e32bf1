/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import {
  ConfigError,
  getConfig,
  hasApiKey,
  loadConfig,
  requireApiKey,
  resetConfig,
} from './index.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        nodeEnv: 'development',
        isProduction: false,
        isDevelopment: true,
        isTest: false,
        apiKeys: { openai: undefined },
        models: { llm: 'gpt-4o-mini', embedding: 'text-embedding-3-small' },
        matchThreshold: 0.78,
        fetchLimit: 150,
        fetchTimeoutMs: 30_000,
        proxyUrl: undefined,
        dataDir: './data',
        logLevel: 'info',
      });
    });

    it('should prefer HTTPS_PROXY over HTTP_PROXY', () => {
      expect(loadConfig({ HTTP_PROXY: 'http://proxy.test:8080' }).proxyUrl).toBe('http://proxy.test:8080');
      expect(
        loadConfig({ HTTPS_PROXY: 'http://secure.test:3128', HTTP_PROXY: 'http://proxy.test:8080' }).proxyUrl
      ).toBe('http://secure.test:3128');
      expect(loadConfig({ HTTPS_PROXY: '' }).proxyUrl).toBeUndefined();
    });

    it('should coerce numeric variables', () => {
      const config = loadConfig({
        MATCH_THRESHOLD: '0.85',
        FETCH_LIMIT: '40',
        FETCH_TIMEOUT_MS: '5000',
      });

      expect(config.matchThreshold).toBe(0.85);
      expect(config.fetchLimit).toBe(40);
      expect(config.fetchTimeoutMs).toBe(5000);
    });

    it('should not clamp the match threshold', () => {
      expect(loadConfig({ MATCH_THRESHOLD: '1.5' }).matchThreshold).toBe(1.5);
      expect(loadConfig({ MATCH_THRESHOLD: '-1' }).matchThreshold).toBe(-1);
    });

    it('should treat empty values as unset', () => {
      const config = loadConfig({ MATCH_THRESHOLD: '', LLM_MODEL: '', PM_DATA_DIR: '' });

      expect(config.matchThreshold).toBe(0.78);
      expect(config.models.llm).toBe('gpt-4o-mini');
      expect(config.dataDir).toBe('./data');
    });

    it('should read overrides', () => {
      const config = loadConfig({
        OPENAI_API_KEY: 'test-secret',
        LLM_MODEL: 'gpt-4o',
        PM_DATA_DIR: '/srv/pm',
        LOG_LEVEL: 'debug',
        NODE_ENV: 'test',
      });

      expect(config.apiKeys.openai).toBe('test-secret');
      expect(config.models.llm).toBe('gpt-4o');
      expect(config.dataDir).toBe('/srv/pm');
      expect(config.logLevel).toBe('debug');
      expect(config.isTest).toBe(true);
    });

    it('should list every invalid variable', () => {
      let caught: unknown;
      try {
        loadConfig({ FETCH_LIMIT: 'many', LOG_LEVEL: 'loud' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      const issues = caught instanceof ConfigError ? caught.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^FETCH_LIMIT: /);
      expect(issues[1]).toMatch(/^LOG_LEVEL: /);
    });

    it('should reject non-positive fetch limits', () => {
      expect(() => loadConfig({ FETCH_LIMIT: '0' })).toThrow(ConfigError);
      expect(() => loadConfig({ FETCH_LIMIT: '2.5' })).toThrow(ConfigError);
    });
  });

  describe('getConfig', () => {
    const originalThreshold = process.env.MATCH_THRESHOLD;

    afterEach(() => {
      if (originalThreshold === undefined) {
        delete process.env.MATCH_THRESHOLD;
      } else {
        process.env.MATCH_THRESHOLD = originalThreshold;
      }
      resetConfig();
    });

    it('should cache the process configuration until reset', () => {
      process.env.MATCH_THRESHOLD = '0.6';
      resetConfig();
      const first = getConfig();

      process.env.MATCH_THRESHOLD = '0.9';
      expect(getConfig()).toBe(first);
      expect(getConfig().matchThreshold).toBe(0.6);

      resetConfig();
      expect(getConfig().matchThreshold).toBe(0.9);
    });
  });

  describe('hasApiKey', () => {
    it('should reflect whether the key is set', () => {
      expect(hasApiKey('openai', loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toBe(true);
      expect(hasApiKey('openai', loadConfig({}))).toBe(false);
      expect(hasApiKey('openai', loadConfig({ OPENAI_API_KEY: '' }))).toBe(false);
    });
  });

  describe('requireApiKey', () => {
    it('should throw for empty keys', () => {
      expect(() => requireApiKey('openai', loadConfig({ OPENAI_API_KEY: '' }))).toThrow(
        /Missing required API key: OPENAI_API_KEY/
      );
    });

    it('should return key when present in config', () => {
      expect(requireApiKey('openai', loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toBe('test-secret');
    });
  });
});
