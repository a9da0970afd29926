import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SpotifyCatalog } from '@tracksync/providers-spotify';

import { loadWorkerConfig } from '../../config';
import { createSourceCatalog, createTargetCatalog, MissingProviderAuthError, ProviderDisabledError } from '..';

describe('createTargetCatalog', () => {
  it('builds a Spotify catalog from the configured token', async () => {
    const responses = [{ id: 'me' }, { items: [], next: null, offset: 0, limit: 50, total: 0 }];
    const fetchStub = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        new Response(JSON.stringify(responses.shift() ?? {}), { status: 200 }),
    );
    const config = loadWorkerConfig({ SPOTIFY_ACCESS_TOKEN: 'test-token', SPOTIFY_API_BASE_URL: 'https://api.test/v1' });

    const target = createTargetCatalog(config, { fetch: fetchStub });

    expect(target).toBeInstanceOf(SpotifyCatalog);
    expect(target.role).toBe('target');
    await expect(target.listOwnedCollections()).resolves.toEqual([]);
    expect(fetchStub.mock.calls.map(([url]) => String(url))).toEqual([
      'https://api.test/v1/me',
      'https://api.test/v1/me/playlists?offset=0&limit=50',
    ]);
  });

  it('requires an access token', () => {
    expect(() => createTargetCatalog(loadWorkerConfig({}))).toThrow(MissingProviderAuthError);
  });

  it('honours the provider flag', () => {
    const config = loadWorkerConfig({ SPOTIFY_ACCESS_TOKEN: 'test-token', PROVIDERS_SPOTIFY: 'false' });

    expect(() => createTargetCatalog(config)).toThrow(ProviderDisabledError);
    expect(() => createTargetCatalog(config)).toThrow('Provider "spotify" is disabled by feature flag');
  });
});

describe('createSourceCatalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tracksync-providers-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists CSV files as read-only collections', async () => {
    const file = path.join(dir, 'road-trip.csv');
    await writeFile(file, 'title,artists\nHighway Song,The Band\n', 'utf8');

    const source = createSourceCatalog(loadWorkerConfig({}), [file]);

    expect(source.role).toBe('source');
    await expect(source.listOwnedCollections()).resolves.toEqual([
      { id: 'road-trip', name: 'road-trip', ownerId: 'local', isOwned: true, trackCount: 1 },
    ]);
  });

  it('honours the provider flag', () => {
    expect(() => createSourceCatalog(loadWorkerConfig({ PROVIDERS_FILE: '0' }), [])).toThrow(ProviderDisabledError);
  });
});
