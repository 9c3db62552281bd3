// Response caches keyed by request path + sorted query parameters

import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger, type Logger } from '../utils/logger.js';

export interface ResponseCache {
  /** Payload younger than `ttlSeconds`, or undefined; expired entries are evicted on read */
  get(key: string, ttlSeconds: number): unknown | undefined;
  set(key: string, data: unknown): void;
  invalidate(key: string): void;
  clear(): void;
  readonly size: number;
}

interface CacheEntry {
  storedAt: number;
  data: unknown;
}

export class MemoryResponseCache implements ResponseCache {
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string, ttlSeconds: number): unknown | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt > ttlSeconds * 1000) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.data;
  }

  set(key: string, data: unknown): void {
    this.entries.set(key, { storedAt: this.now(), data });
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

const StoredEntrySchema = z.object({ key: z.string(), storedAt: z.number(), data: z.unknown() });

/** One JSON file per entry, named by a SHA-256 prefix of the key. Each file records its full key; a file holding another key is a miss. */
export class FileResponseCache implements ResponseCache {
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    private readonly now: () => number = Date.now,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('Cache');
    mkdirSync(directory, { recursive: true });
  }

  get(key: string, ttlSeconds: number): unknown | undefined {
    const path = this.pathFor(key);
    if (!existsSync(path)) return undefined;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      this.log.warn('Unreadable cache entry', { key, error: err instanceof Error ? err.message : String(err) });
      return undefined;
    }
    const parsed = StoredEntrySchema.safeParse(raw);
    if (!parsed.success || parsed.data.key !== key) return undefined;
    if (this.now() - parsed.data.storedAt > ttlSeconds * 1000) {
      rmSync(path, { force: true });
      return undefined;
    }
    return parsed.data.data;
  }

  set(key: string, data: unknown): void {
    try {
      writeFileSync(this.pathFor(key), JSON.stringify({ key, storedAt: this.now(), data }));
    } catch (err) {
      this.log.error('Cache write failed', { key, error: err instanceof Error ? err.message : String(err) });
    }
  }

  invalidate(key: string): void {
    rmSync(this.pathFor(key), { force: true });
  }

  clear(): void {
    for (const file of this.entryFiles()) {
      rmSync(join(this.directory, file), { force: true });
    }
  }

  get size(): number {
    return this.entryFiles().length;
  }

  private entryFiles(): string[] {
    return readdirSync(this.directory).filter((file) => file.endsWith('.json'));
  }

  private pathFor(key: string): string {
    const hash = createHash('sha256').update(key).digest('hex').slice(0, 16);
    return join(this.directory, `${hash}.json`);
  }
}

export type QueryParams = Record<string, string | number | undefined>;

export function cacheKey(path: string, params: QueryParams = {}): string {
  const query = Object.entries(params)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join('&');
  return query ? `${path}?${query}` : path;
}
