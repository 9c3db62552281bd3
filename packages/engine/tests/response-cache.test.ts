import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileResponseCache, MemoryResponseCache, cacheKey } from '../client/response-cache.js';
import { silentLogger } from '../utils/logger.js';

describe('cacheKey', () => {
  it('sorts parameters and drops undefined values', () => {
    expect(cacheKey('/company/00000001/filing-history', { items_per_page: 100, category: undefined }))
      .toBe('/company/00000001/filing-history?items_per_page=100');
    expect(cacheKey('/search', { b: 2, a: 'x' })).toBe('/search?a=x&b=2');
  });

  it('is the bare path without parameters', () => {
    expect(cacheKey('/company/00000001/charges')).toBe('/company/00000001/charges');
  });
});

describe('MemoryResponseCache', () => {
  let now: number;
  let cache: MemoryResponseCache;

  beforeEach(() => {
    now = 1_000_000;
    cache = new MemoryResponseCache(() => now);
  });

  it('returns the payload before the TTL elapses', () => {
    cache.set('k', { a: 1 });
    now += 59_000;
    expect(cache.get('k', 60)).toEqual({ a: 1 });
  });

  it('returns nothing after the TTL and evicts the entry', () => {
    cache.set('k', { a: 1 });
    now += 61_000;
    expect(cache.get('k', 60)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('invalidates and clears', () => {
    cache.set('a', 1);
    cache.set('b', 2);
    cache.invalidate('a');
    expect(cache.get('a', 60)).toBeUndefined();
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});

describe('FileResponseCache', () => {
  let dir: string;
  let now: number;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'registry-cache-'));
    now = 5_000_000;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists entries across instances', () => {
    new FileResponseCache(dir, () => now, silentLogger).set('/company/00000001/officers', { items: [] });
    const reopened = new FileResponseCache(dir, () => now, silentLogger);

    expect(reopened.get('/company/00000001/officers', 60)).toEqual({ items: [] });
    expect(reopened.size).toBe(1);
  });

  it('names files by a 16-character hash prefix', () => {
    new FileResponseCache(dir, () => now, silentLogger).set('key', 'value');
    const files = readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{16}\.json$/);
  });

  it('expires and deletes entries past the TTL', () => {
    const cache = new FileResponseCache(dir, () => now, silentLogger);
    cache.set('key', 'value');
    now += 10_001;
    expect(cache.get('key', 10)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('treats a corrupt file as a miss', () => {
    const cache = new FileResponseCache(dir, () => now, silentLogger);
    cache.set('key', 'value');
    const [file] = readdirSync(dir);
    writeFileSync(join(dir, file), '{not json');
    expect(cache.get('key', 60)).toBeUndefined();
  });

  it('misses when the file holds a different key', () => {
    const cache = new FileResponseCache(dir, () => now, silentLogger);
    cache.set('/company/00000001', { company_name: 'EXAMPLE TRADING LTD' });
    const [file] = readdirSync(dir);
    writeFileSync(join(dir, file), JSON.stringify({ key: '/company/00000002', storedAt: now, data: { company_name: 'OTHER LTD' } }));

    expect(cache.get('/company/00000001', 60)).toBeUndefined();
  });

  it('clears every entry', () => {
    const cache = new FileResponseCache(dir, () => now, silentLogger);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.size).toBe(2);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
