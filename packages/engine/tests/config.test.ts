import { describe, it, expect } from 'vitest';
import { createRegistryClient, loadConfig } from '../config/index.js';
import { REGISTRY_API_BASE } from '../config/reference-data.js';
import { ConfigError } from '../types/errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      baseUrl: REGISTRY_API_BASE,
      rateLimit: 600,
      rateWindow: 300,
      cacheTtl: 86_400,
      cacheDir: undefined,
      timeoutMs: 30_000,
      logLevel: 'info',
    });
  });

  it('reads and coerces CH_* variables', () => {
    const config = loadConfig({
      CH_API_KEY: 'test-secret',
      CH_RATE_LIMIT: '120',
      CH_RATE_WINDOW: '60',
      CH_CACHE_DIR: '/tmp/registry-cache',
      CH_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toMatchObject({
      apiKey: 'test-secret',
      rateLimit: 120,
      rateWindow: 60,
      cacheDir: '/tmp/registry-cache',
      logLevel: 'debug',
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ CH_API_KEY: '  ', CH_RATE_LIMIT: '' })).toMatchObject({ apiKey: undefined, rateLimit: 600 });
  });

  it('names every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ CH_RATE_LIMIT: 'lots', CH_LOG_LEVEL: 'verbose' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^CH_RATE_LIMIT: /);
    expect(issues[1]).toMatch(/^CH_LOG_LEVEL: /);
  });
});

describe('createRegistryClient', () => {
  it('requires an API key', () => {
    expect(() => createRegistryClient(loadConfig({}))).toThrow(
      'Invalid configuration: CH_API_KEY: required to query the registry',
    );
  });

  it('sizes the rate limiter from configuration', () => {
    const client = createRegistryClient(loadConfig({ CH_API_KEY: 'test-secret', CH_RATE_LIMIT: '50' }));
    expect(client.health()).toEqual({ rateLimitRemaining: 50, rateLimitMax: 50, cacheEntries: 0 });
  });
});
