// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import {
  validateConfig,
  validateConfigSafe,
  resolveConfigFromEnv,
  DEFAULT_BASE_URL,
} from '../../src/config/ConfigValidator';
import { ConfigError } from '../../src/utils/errors';

describe('ConfigValidator', () => {
  const validConfig = {
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    baseURL: 'https://api.example.com/api',
  };

  it('should validate correct configuration and default the timeout', () => {
    expect(validateConfig(validConfig)).toEqual({ ...validConfig, timeout: 30000 });
  });

  it('should keep an explicit timeout', () => {
    expect(validateConfig({ ...validConfig, timeout: 5000 }).timeout).toBe(5000);
  });

  it('should reject a missing API key', () => {
    const { apiKey: _apiKey, ...invalid } = validConfig;

    expect(() => validateConfig(invalid)).toThrow(ConfigError);
    expect(() => validateConfig(invalid)).toThrow(
      'Invalid client configuration: apiKey: API key is required (WEBTENDER_API_KEY)'
    );
  });

  it('should reject an empty API secret', () => {
    expect(() => validateConfig({ ...validConfig, apiSecret: '' })).toThrow(
      /apiSecret: API secret is required \(WEBTENDER_API_SECRET\)/
    );
  });

  it('should reject a base URL that is not a URL', () => {
    expect(() => validateConfig({ ...validConfig, baseURL: 'api.example.com' })).toThrow(
      /baseURL: Base URL must be a valid URL/
    );
  });

  it('should fall back to the default timeout for 0', () => {
    expect(validateConfig({ ...validConfig, timeout: 0 }).timeout).toBe(30000);
  });

  it('should reject a negative timeout', () => {
    expect(() => validateConfig({ ...validConfig, timeout: -1 })).toThrow(/timeout:/);
  });

  it('should list every issue on the error', () => {
    try {
      validateConfig({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.code).toBe('CONFIG_ERROR');
      expect(error.issues).toEqual([
        'apiKey: API key is required (WEBTENDER_API_KEY)',
        'apiSecret: API secret is required (WEBTENDER_API_SECRET)',
        'baseURL: Base URL is required (WEBTENDER_API_BASE_URL)',
      ]);
    }
  });

  it('should return errors instead of throwing in safe mode', () => {
    const result = validateConfigSafe({ ...validConfig, apiKey: '' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toEqual(['apiKey: API key is required (WEBTENDER_API_KEY)']);
  });

  it('should return data in safe mode', () => {
    const result = validateConfigSafe(validConfig);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.baseURL).toBe('https://api.example.com/api');
  });
});

describe('resolveConfigFromEnv', () => {
  const env = {
    WEBTENDER_API_KEY: 'env-key',
    WEBTENDER_API_SECRET: 'env-secret',
  };

  it('should read credentials from the environment and default the base URL', () => {
    expect(resolveConfigFromEnv({}, env)).toEqual({
      apiKey: 'env-key',
      apiSecret: 'env-secret',
      baseURL: DEFAULT_BASE_URL,
      timeout: undefined,
    });
  });

  it('should let explicit values win', () => {
    const resolved = resolveConfigFromEnv(
      { apiKey: 'explicit-key', baseURL: 'https://staging.example.com', timeout: 1000 },
      { ...env, WEBTENDER_API_BASE_URL: 'https://env.example.com', WEBTENDER_API_TIMEOUT_MS: '2000' }
    );

    expect(resolved).toEqual({
      apiKey: 'explicit-key',
      apiSecret: 'env-secret',
      baseURL: 'https://staging.example.com',
      timeout: 1000,
    });
  });

  it('should treat empty strings as unset', () => {
    expect(resolveConfigFromEnv({ apiKey: '' }, env).apiKey).toBe('env-key');
  });

  it('should parse the timeout from the environment', () => {
    expect(resolveConfigFromEnv({}, { ...env, WEBTENDER_API_TIMEOUT_MS: '2500' }).timeout).toBe(
      2500
    );
  });

  it('should use the default timeout when the environment sets 0', () => {
    const resolved = resolveConfigFromEnv({}, { ...env, WEBTENDER_API_TIMEOUT_MS: '0' });

    expect(validateConfig(resolved).timeout).toBe(30000);
  });

  it('should leave missing credentials for validation to reject', () => {
    const resolved = resolveConfigFromEnv({}, {});

    expect(resolved.apiKey).toBeUndefined();
    expect(() => validateConfig(resolved)).toThrow(/API key is required/);
  });
});
