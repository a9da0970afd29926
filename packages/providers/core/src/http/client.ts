import {
  NotFoundError,
  PermanentFailureError,
  RateLimitedError,
  TemporaryFailureError,
} from '@tracksync/contracts';

import type { CacheBackend } from './cache';
import { computeCacheKey, isCacheable } from './cache';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type Sleep = (ms: number) => Promise<void>;

export interface HttpClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  getAuthHeader?: () => Promise<string | undefined>;
  /** Scopes cache keys, e.g. to the authenticated user. */
  getCacheScope?: () => string | number | undefined;
  /** Retries for GET on 5xx and network errors. Writes are never retried here. */
  retries?: number;
  retryBaseMs?: number;
  cache?: CacheBackend;
  cacheTtlMs?: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
}

export interface RequestOptions {
  query?: Record<string, string | number | undefined>;
  body?: unknown;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Retry-After is seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, fallbackMs = 1000): number {
  if (!value) return fallbackMs;
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return Math.max(0, numeric) * 1000;
  }
  const parsedDate = Date.parse(value);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - Date.now());
  }
  return fallbackMs;
}

async function errorForResponse(resp: Response): Promise<Error> {
  const text = await resp.text().catch(() => '');
  const detail = `HTTP ${resp.status}${text ? `: ${text.slice(0, 200)}` : ''}`;

  if (resp.status === 429) {
    return new RateLimitedError(parseRetryAfter(resp.headers.get('retry-after')), detail);
  }
  if (resp.status === 404) {
    return new NotFoundError(detail);
  }
  if (resp.status >= 500 || resp.status === 408) {
    return new TemporaryFailureError(detail, resp.status);
  }
  return new PermanentFailureError(detail, resp.status);
}

export class HttpClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;

  constructor(private opts: HttpClientOptions) {
    this.fetchImpl = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  buildUrl(path: string, query?: RequestOptions['query']): string {
    const base = this.opts.baseUrl.replace(/\/$/, '');
    const url = new URL(/^https?:\/\//.test(path) ? path : `${base}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const { retries = 3, retryBaseMs = 300, cache, cacheTtlMs = 60000 } = this.opts;
    const url = this.buildUrl(path, options.query);
    const cacheKey = cache && method === 'GET' ? computeCacheKey(method, url, this.opts.getCacheScope?.()) : null;

    if (cache && cacheKey) {
      const cached = await cache.get(cacheKey);
      if (cached !== null) {
        return JSON.parse(cached) as T;
      }
    }

    const maxAttempts = method === 'GET' ? retries : 0;
    let attempt = 0;

    while (true) {
      const headers = new Headers(this.opts.headers);
      if (this.opts.getAuthHeader) {
        const h = await this.opts.getAuthHeader();
        if (h) headers.set('authorization', h);
      }

      const init: RequestInit = { method, headers };
      if (options.body !== undefined) {
        headers.set('content-type', 'application/json');
        init.body = JSON.stringify(options.body);
      }

      let resp: Response;
      try {
        resp = await this.fetchImpl(url, init);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (attempt >= maxAttempts) {
          throw new TemporaryFailureError(`Network error: ${message}`);
        }
        attempt++;
        await this.sleep(retryBaseMs * Math.pow(2, attempt - 1));
        continue;
      }

      if (resp.status >= 500 && attempt < maxAttempts) {
        attempt++;
        await this.sleep(retryBaseMs * Math.pow(2, attempt - 1));
        continue;
      }

      if (!resp.ok) {
        throw await errorForResponse(resp);
      }

      const text = resp.status === 204 ? '' : await resp.text();
      const body = (text ? JSON.parse(text) : undefined) as T;

      if (cache && cacheKey && text && isCacheable(method, resp.status)) {
        await cache.set(cacheKey, text, cacheTtlMs);
      }
      // A write can change any listing read before it.
      if (cache && method !== 'GET') {
        await cache.clear();
      }

      return body;
    }
  }
}
