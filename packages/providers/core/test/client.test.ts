import {
  NotFoundError,
  PermanentFailureError,
  RateLimitedError,
  TemporaryFailureError,
} from '@tracksync/contracts';
import { describe, expect, it, vi } from 'vitest';

import { InMemoryCache } from '../src/http/cache';
import { HttpClient, parseRetryAfter } from '../src/http/client';

const json = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } });

function makeClient(responses: Array<Response | Error>, extra: Partial<ConstructorParameters<typeof HttpClient>[0]> = {}) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new Error('no more responses');
    if (next instanceof Error) throw next;
    return next;
  });
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new HttpClient({
    baseUrl: 'https://api.test/v1/',
    fetch: fetchMock,
    sleep,
    retryBaseMs: 100,
    ...extra,
  });
  return { client, fetchMock, sleep };
}

describe('HttpClient.buildUrl', () => {
  it('joins paths and skips undefined query values', () => {
    const { client } = makeClient([]);
    expect(client.buildUrl('/search', { q: 'isrc:ABC', limit: 3, offset: undefined })).toBe(
      'https://api.test/v1/search?q=isrc%3AABC&limit=3',
    );
  });

  it('keeps absolute urls', () => {
    const { client } = makeClient([]);
    expect(client.buildUrl('https://other.test/next?page=2')).toBe('https://other.test/next?page=2');
  });
});

describe('HttpClient.request', () => {
  it('sends auth headers and json bodies', async () => {
    const { client, fetchMock } = makeClient([json({ ok: true }, 201)], {
      getAuthHeader: async () => 'Bearer test-token',
    });

    await expect(client.request('POST', '/items', { body: { uris: ['a'] } })).resolves.toEqual({ ok: true });

    const init = fetchMock.mock.calls[0]?.[1];
    const headers = new Headers(init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('content-type')).toBe('application/json');
    expect(init?.body).toBe('{"uris":["a"]}');
  });

  it('retries GET on 5xx with exponential back-off', async () => {
    const { client, fetchMock, sleep } = makeClient([json({}, 502), json({}, 503), json({ items: [] })]);

    await expect(client.request('GET', '/items')).resolves.toEqual({ items: [] });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('does not retry writes', async () => {
    const { client, fetchMock } = makeClient([json({}, 500)]);

    await expect(client.request('POST', '/items', { body: {} })).rejects.toBeInstanceOf(TemporaryFailureError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports network failures as temporary once retries run out', async () => {
    const { client, fetchMock } = makeClient([new Error('ECONNRESET'), new Error('ECONNRESET')], { retries: 1 });

    await expect(client.request('GET', '/items')).rejects.toThrow('Network error: ECONNRESET');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('maps status codes to provider errors', async () => {
    const { client } = makeClient([
      json({ error: 'slow down' }, 429, { 'retry-after': '7' }),
      json({}, 404),
      json({}, 403),
    ]);

    const limited = await client.request('GET', '/a').catch((error: unknown) => error);
    expect(limited).toBeInstanceOf(RateLimitedError);
    expect(limited).toMatchObject({ retryAfterMs: 7000, status: 429 });

    await expect(client.request('GET', '/b')).rejects.toBeInstanceOf(NotFoundError);
    await expect(client.request('GET', '/c')).rejects.toBeInstanceOf(PermanentFailureError);
  });

  it('serves repeated GETs from the cache', async () => {
    const cache = new InMemoryCache();
    const { client, fetchMock } = makeClient([json({ n: 1 })], { cache, getCacheScope: () => 'user-1' });

    await expect(client.request('GET', '/me')).resolves.toEqual({ n: 1 });
    await expect(client.request('GET', '/me')).resolves.toEqual({ n: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1 });
  });

  it('drops cached reads after a successful write', async () => {
    const cache = new InMemoryCache();
    const { client, fetchMock } = makeClient([json({ n: 1 }), json({ ok: true }, 201), json({ n: 2 })], { cache });

    await expect(client.request('GET', '/me/playlists')).resolves.toEqual({ n: 1 });
    await client.request('POST', '/users/me/playlists', { body: { name: 'Mix' } });
    await expect(client.request('GET', '/me/playlists')).resolves.toEqual({ n: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('returns undefined for empty responses', async () => {
    const { client } = makeClient([new Response(null, { status: 204 })]);
    await expect(client.request('DELETE', '/items/1')).resolves.toBeUndefined();
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds and falls back when absent or invalid', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(null)).toBe(1000);
    expect(parseRetryAfter('soon', 500)).toBe(500);
  });
});
