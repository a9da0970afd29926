import { beforeEach, describe, expect, it } from 'vitest';

import { computeCacheKey, InMemoryCache, isCacheable } from '../src/http/cache';

const SEARCH_URL = 'https://api.test/v1/search?q=isrc%3AUSTEST0000001&type=track';

describe('computeCacheKey', () => {
  it('is stable for the same request', () => {
    expect(computeCacheKey('get', SEARCH_URL, 'acct')).toBe(computeCacheKey('GET', SEARCH_URL, 'acct'));
    expect(computeCacheKey('GET', SEARCH_URL)).toMatch(/^http:[0-9a-f]{64}$/);
  });

  it('separates method, url and scope', () => {
    const base = computeCacheKey('GET', SEARCH_URL, 'acct');
    expect(computeCacheKey('POST', SEARCH_URL, 'acct')).not.toBe(base);
    expect(computeCacheKey('GET', `${SEARCH_URL}&limit=5`, 'acct')).not.toBe(base);
    expect(computeCacheKey('GET', SEARCH_URL, 'other')).not.toBe(base);
    expect(computeCacheKey('GET', SEARCH_URL)).not.toBe(base);
  });
});

describe('isCacheable', () => {
  it('accepts successful GETs only', () => {
    expect([200, 204, 299].map((status) => isCacheable('GET', status))).toEqual([true, true, true]);
    expect([199, 304, 404, 503].map((status) => isCacheable('GET', status))).toEqual([false, false, false, false]);
    expect(isCacheable('POST', 201)).toBe(false);
  });
});

describe('InMemoryCache', () => {
  let cache: InMemoryCache;

  beforeEach(() => {
    cache = new InMemoryCache({ maxEntries: 2, ttlMs: 1000 });
  });

  it('counts hits and misses', async () => {
    await cache.set('search:a', '{"tracks":[]}', 1000);

    expect(await cache.get('search:a')).toBe('{"tracks":[]}');
    expect(await cache.get('search:b')).toBeNull();
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, evictions: 0 });
  });

  it('drops the least recently used entry when full', async () => {
    await cache.set('a', '1', 1000);
    await cache.set('b', '2', 1000);
    await cache.get('a');
    await cache.set('c', '3', 1000);

    expect(await cache.get('b')).toBeNull();
    expect(await cache.get('a')).toBe('1');
    expect(await cache.get('c')).toBe('3');
    expect(cache.getStats().evictions).toBe(1);
  });

  it('removes single entries and resets on clear', async () => {
    await cache.set('a', '1', 1000);
    await cache.set('b', '2', 1000);
    await cache.delete('a');
    expect(await cache.get('a')).toBeNull();

    await cache.clear();
    expect(cache.getStats()).toEqual({ hits: 0, misses: 0, evictions: 0 });
    expect(await cache.get('b')).toBeNull();
  });

  it('expires entries after their ttl', async () => {
    await cache.set('short', 'x', 30);
    expect(await cache.get('short')).toBe('x');

    await new Promise((resolve) => setTimeout(resolve, 80));

    expect(await cache.get('short')).toBeNull();
  });
});
