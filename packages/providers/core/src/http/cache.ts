import { createHash } from 'node:crypto';

import { LRUCache } from 'lru-cache';

/** Where catalog responses are kept between identical GETs. Values are raw response bodies. */
export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
}

export interface InMemoryCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
}

const emptyStats = (): CacheStats => ({ hits: 0, misses: 0, evictions: 0 });

/** Process-local LRU; one per catalog instance, so entries die with the job. */
export class InMemoryCache implements CacheBackend {
  private readonly entries: LRUCache<string, string>;
  private stats = emptyStats();

  constructor({ maxEntries = 1000, ttlMs = 60_000 }: InMemoryCacheOptions = {}) {
    this.entries = new LRUCache<string, string>({
      max: maxEntries,
      ttl: ttlMs,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict') this.stats.evictions += 1;
      },
    });
  }

  async get(key: string): Promise<string | null> {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.stats.misses += 1;
      return null;
    }
    this.stats.hits += 1;
    return value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, value, { ttl: ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.stats = emptyStats();
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }
}

/** `http:<sha256>` over method, absolute URL and the optional scope (e.g. the token's account). */
export function computeCacheKey(method: string, url: string, scope?: string | number): string {
  const material = [method.toUpperCase(), url, ...(scope === undefined ? [] : [String(scope)])].join('::');
  return `http:${createHash('sha256').update(material).digest('hex')}`;
}

export function isCacheable(method: string, status: number): boolean {
  return method.toUpperCase() === 'GET' && status >= 200 && status < 300;
}
