// Companies House client: every upstream call goes through here for caching, rate limiting and retries

import type { z } from 'zod';
import {
  AddressSchema,
  AppointmentListSchema,
  ChargeListSchema,
  CompanyProfileSchema,
  DisqualificationSchema,
  FilingHistorySchema,
  InsolvencySchema,
  OfficerListSchema,
  PscListSchema,
  PscStatementListSchema,
  type Address,
  type AppointmentList,
  type ChargeList,
  type CompanyProfile,
  type Disqualification,
  type FilingHistory,
  type Insolvency,
  type OfficerList,
  type PscList,
  type PscStatementList,
  type RegistryReader,
  type RegistryResult,
} from '../types/registry.js';
import { RateLimitedError, RegistryLensError, UpstreamUnavailableError, errorMessage } from '../types/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { defaultSleep, SlidingWindowRateLimiter } from './rate-limiter.js';
import { cacheKey, MemoryResponseCache, type QueryParams, type ResponseCache } from './response-cache.js';
import type { RegistryTransport } from './transport.js';

/** Cache TTL presets in seconds */
export const CacheTTL = {
  PROFILE: 0,         // company profile is always read live
  DEFAULT: 86_400,    // 24 hours
} as const;

/** Waits before each 429 retry */
export const RATE_LIMIT_BACKOFF_MS = [10_000, 30_000, 60_000] as const;
export const ERROR_RETRIES = 2;
export const ERROR_RETRY_DELAY_MS = 5_000;

const PROFILE_PATH = /^\/company\/[^/]+$/;

export interface FetchOptions {
  /** Seconds; 0 skips the cache */
  cacheTtl?: number;
}

export interface RegistryClientOptions {
  transport: RegistryTransport;
  limiter?: SlidingWindowRateLimiter;
  cache?: ResponseCache;
  defaultCacheTtl?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface ClientHealth {
  rateLimitRemaining: number;
  rateLimitMax: number;
  cacheEntries: number;
}

export class RegistryClient implements RegistryReader {
  readonly limiter: SlidingWindowRateLimiter;
  readonly cache: ResponseCache;
  private readonly transport: RegistryTransport;
  private readonly defaultCacheTtl: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;
  private readonly inFlight = new Map<string, Promise<RegistryResult<unknown>>>();

  constructor(options: RegistryClientOptions) {
    this.transport = options.transport;
    this.limiter = options.limiter ?? new SlidingWindowRateLimiter();
    this.cache = options.cache ?? new MemoryResponseCache();
    this.defaultCacheTtl = options.defaultCacheTtl ?? CacheTTL.DEFAULT;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger('RegistryClient');
  }

  /**
   * GET a registry resource.
   * Resolves to the payload or an explicit not_found; rejects with
   * UpstreamUnavailableError once retries are exhausted.
   */
  async fetch(path: string, params: QueryParams = {}, options: FetchOptions = {}): Promise<RegistryResult<unknown>> {
    const ttl = PROFILE_PATH.test(path) ? 0 : options.cacheTtl ?? this.defaultCacheTtl;
    if (ttl <= 0) return this.request(path, params);

    const key = cacheKey(path, params);
    const cached = this.cache.get(key, ttl);
    if (cached !== undefined) {
      this.log.debug('Cache hit', { key });
      return { status: 'ok', data: cached };
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const promise = this.request(path, params)
      .then((result) => {
        if (result.status === 'ok') this.cache.set(key, result.data);
        return result;
      })
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, promise);
    return promise;
  }

  private async request(path: string, params: QueryParams): Promise<RegistryResult<unknown>> {
    let attempts = 0;
    let rateLimitRetries = 0;
    let errorRetries = 0;

    for (;;) {
      await this.limiter.acquire();
      attempts++;

      let status: number;
      let body: unknown;
      try {
        ({ status, body } = await this.transport.get(path, params));
      } catch (err) {
        if (errorRetries < ERROR_RETRIES) {
          errorRetries++;
          this.log.warn('Request failed, retrying', { path, attempt: attempts, error: errorMessage(err) });
          await this.sleep(ERROR_RETRY_DELAY_MS);
          continue;
        }
        throw new UpstreamUnavailableError(path, attempts, undefined, { cause: err });
      }

      if (status === 200) return { status: 'ok', data: body };
      if (status === 404) return { status: 'not_found' };

      if (status === 429) {
        if (rateLimitRetries < RATE_LIMIT_BACKOFF_MS.length) {
          const wait = RATE_LIMIT_BACKOFF_MS[rateLimitRetries];
          rateLimitRetries++;
          this.log.warn('Rate limited by registry, backing off', { path, waitMs: wait, attempt: attempts });
          await this.sleep(wait);
          continue;
        }
        throw new UpstreamUnavailableError(path, attempts, status, { cause: new RateLimitedError(path) });
      }

      if (errorRetries < ERROR_RETRIES) {
        errorRetries++;
        this.log.warn('Registry error, retrying', { path, status, attempt: attempts });
        await this.sleep(ERROR_RETRY_DELAY_MS);
        continue;
      }
      this.log.error('Registry error, giving up', { path, status, attempts });
      throw new UpstreamUnavailableError(path, attempts, status);
    }
  }

  private async read<S extends z.ZodTypeAny>(
    schema: S,
    path: string,
    params: QueryParams = {},
  ): Promise<z.output<S> | null> {
    let result: RegistryResult<unknown>;
    try {
      result = await this.fetch(path, params);
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) {
        this.log.warn('No data: registry unavailable', { path, error: err.message });
        return null;
      }
      throw err;
    }
    if (result.status === 'not_found') return null;

    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
      this.log.warn('No data: malformed payload', { path, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  /** Uncached profile lookup that keeps not_found distinct from other failures */
  async lookupCompany(companyNumber: string): Promise<RegistryResult<CompanyProfile>> {
    const path = `/company/${companyNumber}`;
    const result = await this.fetch(path);
    if (result.status === 'not_found') return result;
    const parsed = CompanyProfileSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new RegistryLensError(`Malformed company profile for ${companyNumber}`, { cause: parsed.error });
    }
    return { status: 'ok', data: parsed.data };
  }

  getCompany(companyNumber: string): Promise<CompanyProfile | null> {
    return this.read(CompanyProfileSchema, `/company/${companyNumber}`);
  }

  getOfficers(companyNumber: string): Promise<OfficerList | null> {
    return this.read(OfficerListSchema, `/company/${companyNumber}/officers`, { items_per_page: 100 });
  }

  getAppointments(officerId: string): Promise<AppointmentList | null> {
    return this.read(AppointmentListSchema, `/officers/${officerId}/appointments`, { items_per_page: 50 });
  }

  /** null when the officer is not disqualified (the registry answers 404) */
  getDisqualifications(officerId: string): Promise<Disqualification | null> {
    return this.read(DisqualificationSchema, `/disqualified-officers/natural/${officerId}`);
  }

  getInsolvency(companyNumber: string): Promise<Insolvency | null> {
    return this.read(InsolvencySchema, `/company/${companyNumber}/insolvency`);
  }

  getPscs(companyNumber: string): Promise<PscList | null> {
    return this.read(PscListSchema, `/company/${companyNumber}/persons-with-significant-control`);
  }

  getPscStatements(companyNumber: string): Promise<PscStatementList | null> {
    return this.read(
      PscStatementListSchema,
      `/company/${companyNumber}/persons-with-significant-control-statements`,
    );
  }

  getFilingHistory(companyNumber: string, category?: string): Promise<FilingHistory | null> {
    return this.read(FilingHistorySchema, `/company/${companyNumber}/filing-history`, {
      items_per_page: 100,
      category,
    });
  }

  getCharges(companyNumber: string): Promise<ChargeList | null> {
    return this.read(ChargeListSchema, `/company/${companyNumber}/charges`);
  }

  getRegisteredOffice(companyNumber: string): Promise<Address | null> {
    return this.read(AddressSchema, `/company/${companyNumber}/registered-office-address`);
  }

  health(): ClientHealth {
    return {
      rateLimitRemaining: this.limiter.remaining(),
      rateLimitMax: this.limiter.maxRequests,
      cacheEntries: this.cache.size,
    };
  }
}
