import { describe, it, expect, vi, afterEach } from 'vitest';
import { RegistryClient, RATE_LIMIT_BACKOFF_MS } from '../client/registry-client.js';
import { SlidingWindowRateLimiter } from '../client/rate-limiter.js';
import { MemoryResponseCache } from '../client/response-cache.js';
import { HttpRegistryTransport } from '../client/transport.js';
import { RateLimitedError, RegistryLensError, UpstreamUnavailableError } from '../types/errors.js';
import { silentLogger } from '../utils/logger.js';
import { FakeRegistryTransport, fakeClient, officer, profile } from './helpers/fake-registry.js';

function clientWithSleeps(transport: FakeRegistryTransport) {
  const sleeps: number[] = [];
  const client = new RegistryClient({
    transport,
    limiter: new SlidingWindowRateLimiter({ maxRequests: 100 }),
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    logger: silentLogger,
  });
  return { client, sleeps };
}

describe('RegistryClient', () => {
  describe('caching', () => {
    it('serves repeat reads from the cache without spending rate-limit budget', async () => {
      const transport = new FakeRegistryTransport()
        .on('/company/00000001/officers', { items: [officer('SMITH, Jane', 'abc')] });
      const client = fakeClient(transport);

      const first = await client.getOfficers('00000001');
      const second = await client.getOfficers('00000001');

      expect(second).toEqual(first);
      expect(transport.callsTo('/company/00000001/officers')).toBe(1);
      expect(client.health().rateLimitRemaining).toBe(9_999);
      expect(client.health().cacheEntries).toBe(1);
    });

    it('never caches the company profile', async () => {
      const transport = new FakeRegistryTransport().on('/company/00000001', profile());
      const client = fakeClient(transport);

      await client.getCompany('00000001');
      await client.getCompany('00000001');

      expect(transport.callsTo('/company/00000001')).toBe(2);
      expect(client.health().cacheEntries).toBe(0);
    });

    it('shares one upstream call between identical concurrent reads', async () => {
      const transport = new FakeRegistryTransport()
        .on('/company/00000001/persons-with-significant-control', { items: [] });
      const client = fakeClient(transport);

      const [a, b] = await Promise.all([client.getPscs('00000001'), client.getPscs('00000001')]);

      expect(a).toEqual({ items: [] });
      expect(b).toEqual({ items: [] });
      expect(transport.callsTo('/company/00000001/persons-with-significant-control')).toBe(1);
    });

    it('expires entries after the configured TTL', async () => {
      let now = 0;
      const transport = new FakeRegistryTransport().on('/company/00000001/charges', { items: [] });
      const client = new RegistryClient({
        transport,
        cache: new MemoryResponseCache(() => now),
        defaultCacheTtl: 60,
        logger: silentLogger,
      });

      await client.getCharges('00000001');
      now = 61_000;
      await client.getCharges('00000001');

      expect(transport.callsTo('/company/00000001/charges')).toBe(2);
    });

    it('sends the page size and category in the query', async () => {
      const transport = new FakeRegistryTransport().on('/company/00000001/filing-history', { items: [] });
      const client = fakeClient(transport);

      await client.getFilingHistory('00000001', 'accounts');

      expect(transport.calls).toEqual(['/company/00000001/filing-history?category=accounts&items_per_page=100']);
    });
  });

  describe('retries', () => {
    it('backs off on 429 and then succeeds', async () => {
      const statuses = [429, 429, 200];
      const transport = new FakeRegistryTransport().respond('/company/00000001/charges', () => {
        const status = statuses.shift() ?? 200;
        return { status, body: status === 200 ? { items: [] } : undefined };
      });
      const { client, sleeps } = clientWithSleeps(transport);

      const result = await client.fetch('/company/00000001/charges');

      expect(result).toEqual({ status: 'ok', data: { items: [] } });
      expect(sleeps).toEqual([10_000, 30_000]);
      expect(transport.callsTo('/company/00000001/charges')).toBe(3);
    });

    it('gives up after the backoff schedule with the rate limit as cause', async () => {
      const transport = new FakeRegistryTransport().respond('/company/00000001/charges', { status: 429, body: undefined });
      const { client, sleeps } = clientWithSleeps(transport);

      const error = await client.fetch('/company/00000001/charges').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      if (!(error instanceof UpstreamUnavailableError)) return;
      expect(error.attempts).toBe(4);
      expect(error.lastStatus).toBe(429);
      expect(error.cause).toBeInstanceOf(RateLimitedError);
      expect(sleeps).toEqual([...RATE_LIMIT_BACKOFF_MS]);
    });

    it('retries server errors twice, then typed reads return null', async () => {
      const transport = new FakeRegistryTransport().respond('/company/00000001/charges', { status: 503, body: undefined });
      const { client, sleeps } = clientWithSleeps(transport);

      expect(await client.getCharges('00000001')).toBeNull();
      expect(transport.callsTo('/company/00000001/charges')).toBe(3);
      expect(sleeps).toEqual([5_000, 5_000]);
    });

    it('retries network failures and reports the final one', async () => {
      const transport = new FakeRegistryTransport().respond('/company/00000001/charges', () => {
        throw new Error('socket hang up');
      });
      const { client } = clientWithSleeps(transport);

      await expect(client.fetch('/company/00000001/charges'))
        .rejects.toThrow('Registry unavailable for /company/00000001/charges after 3 attempt(s)');
    });

    it('does not retry a 404', async () => {
      const transport = new FakeRegistryTransport();
      const { client, sleeps } = clientWithSleeps(transport);

      expect(await client.getInsolvency('00000001')).toBeNull();
      expect(transport.calls).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });
  });

  describe('lookupCompany', () => {
    it('keeps not_found distinct', async () => {
      const client = fakeClient(new FakeRegistryTransport());
      expect(await client.lookupCompany('00000009')).toEqual({ status: 'not_found' });
    });

    it('parses the profile leniently', async () => {
      const transport = new FakeRegistryTransport().on('/company/00000001', {
        company_number: '00000001',
        company_name: 'EXAMPLE TRADING LTD',
        company_status: 'active',
        type: 'ltd',
        sic_codes: null,
        accounts: null,
        unexpected_field: true,
      });
      const result = await fakeClient(transport).lookupCompany('00000001');

      expect(result.status).toBe('ok');
      if (result.status !== 'ok') return;
      expect(result.data.sic_codes).toEqual([]);
      expect(result.data.accounts.overdue).toBe(false);
      expect(result.data.registered_office_address).toEqual({});
    });

    it('rejects a malformed profile', async () => {
      const transport = new FakeRegistryTransport().on('/company/00000001', { company_name: 42 });
      await expect(fakeClient(transport).lookupCompany('00000001')).rejects.toBeInstanceOf(RegistryLensError);
    });
  });

  it('returns null for a malformed list payload', async () => {
    const transport = new FakeRegistryTransport().on('/company/00000001/officers', { items: 'not-a-list' });
    expect(await fakeClient(transport).getOfficers('00000001')).toBeNull();
  });
});

describe('HttpRegistryTransport', () => {
  const mockFetch = vi.fn();

  afterEach(() => {
    vi.unstubAllGlobals();
    mockFetch.mockReset();
  });

  it('sends the key as Basic auth with an empty password', async () => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValueOnce(new Response(JSON.stringify({ items: [] }), { status: 200 }));

    const transport = new HttpRegistryTransport({ apiKey: 'test-secret', baseUrl: 'https://registry.test/' });
    const response = await transport.get('/company/00000001/officers', { items_per_page: 100, category: undefined });

    expect(response).toEqual({ status: 200, body: { items: [] } });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://registry.test/company/00000001/officers?items_per_page=100');
    expect(init.headers.Authorization).toBe(`Basic ${Buffer.from('test-secret:').toString('base64')}`);
  });

  it('drops the body of non-200 responses', async () => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValueOnce(new Response('gone', { status: 404 }));

    const transport = new HttpRegistryTransport({ apiKey: 'test-secret' });
    expect(await transport.get('/company/00000009', {})).toEqual({ status: 404, body: undefined });
  });
});
