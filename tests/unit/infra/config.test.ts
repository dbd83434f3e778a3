/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.DONATIONS_CONFIG_PATH).toBe('config/donations.yaml');
      expect(env.DONATIONS_DATA_DIR).toBe('data');
      expect(env.MISMATCH_PREVIEW_LIMIT).toBe(10);
      expect(env.ALLOWED_ORIGINS).toBeUndefined();
    });

    it('parses numeric variables', () => {
      const env = parseEnv({ PORT: '8080', MISMATCH_PREVIEW_LIMIT: '25' });

      expect(env.PORT).toBe(8080);
      expect(env.MISMATCH_PREVIEW_LIMIT).toBe(25);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });

    it('throws on a negative or fractional preview limit', () => {
      expect(() => parseEnv({ MISMATCH_PREVIEW_LIMIT: '-1' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ MISMATCH_PREVIEW_LIMIT: '2.5' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on an unknown NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.logger.pretty).toBe(false);

      const testConfig = createConfig(parseEnv({ NODE_ENV: 'test' }));
      expect(testConfig.server.isTest).toBe(true);
      expect(testConfig.logger.pretty).toBe(true);
    });

    it('groups the donation settings', () => {
      const config = createConfig(
        parseEnv({
          DONATIONS_CONFIG_PATH: '/etc/donations.yaml',
          DONATIONS_DATA_DIR: '/srv/data',
          MISMATCH_PREVIEW_LIMIT: '3',
          ALLOWED_ORIGINS: 'https://dashboard.example.org',
        })
      );

      expect(config.donations).toEqual({
        configPath: '/etc/donations.yaml',
        dataDir: '/srv/data',
        mismatchPreviewLimit: 3,
      });
      expect(config.cors.allowedOrigins).toBe('https://dashboard.example.org');
    });
  });
});
