// Configuration from CH_* environment variables, and the client factory built on it
// The cache backend is selected by CH_CACHE_DIR: unset keeps responses in memory.

import { z } from 'zod';
import { HttpRegistryTransport } from '../client/transport.js';
import { RegistryClient } from '../client/registry-client.js';
import { SlidingWindowRateLimiter } from '../client/rate-limiter.js';
import { FileResponseCache, MemoryResponseCache } from '../client/response-cache.js';
import { ConfigError } from '../types/errors.js';
import { createLogger, type LogLevel } from '../utils/logger.js';
import { REGISTRY_API_BASE } from './reference-data.js';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  CH_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  CH_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(REGISTRY_API_BASE)),
  CH_RATE_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(600)),
  CH_RATE_WINDOW: z.preprocess(blankToUndefined, z.coerce.number().positive().default(300)),
  CH_CACHE_TTL: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(86_400)),
  CH_CACHE_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  CH_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(30_000)),
  CH_LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ),
});

export interface RegistryLensConfig {
  apiKey?: string;
  baseUrl: string;
  rateLimit: number;
  /** Seconds */
  rateWindow: number;
  /** Seconds */
  cacheTtl: number;
  cacheDir?: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): RegistryLensConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    apiKey: e.CH_API_KEY,
    baseUrl: e.CH_BASE_URL,
    rateLimit: e.CH_RATE_LIMIT,
    rateWindow: e.CH_RATE_WINDOW,
    cacheTtl: e.CH_CACHE_TTL,
    cacheDir: e.CH_CACHE_DIR,
    timeoutMs: e.CH_TIMEOUT_MS,
    logLevel: e.CH_LOG_LEVEL,
  };
}

/** Live client over HTTP; requires CH_API_KEY */
export function createRegistryClient(config: RegistryLensConfig): RegistryClient {
  if (!config.apiKey) {
    throw new ConfigError(['CH_API_KEY: required to query the registry']);
  }
  const logger = createLogger('RegistryClient', { level: config.logLevel });
  const cache = config.cacheDir
    ? new FileResponseCache(config.cacheDir, Date.now, createLogger('Cache', { level: config.logLevel }))
    : new MemoryResponseCache();

  return new RegistryClient({
    transport: new HttpRegistryTransport({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    }),
    limiter: new SlidingWindowRateLimiter({
      maxRequests: config.rateLimit,
      windowMs: config.rateWindow * 1000,
    }),
    cache,
    defaultCacheTtl: config.cacheTtl,
    logger,
  });
}
