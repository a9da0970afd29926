import type { ProviderName, SourceCatalog, TargetCatalog } from '@tracksync/contracts';
import { createFileSource } from '@tracksync/interop';
import { InMemoryCache, type Sleep } from '@tracksync/providers-core';
import SpotifyCatalog from '@tracksync/providers-spotify';

import type { WorkerConfig } from '../config';
import { assertEnabled } from './config';

export { assertEnabled, ProviderDisabledError } from './config';

/** Thrown when no credentials are configured for the requested provider. */
export class MissingProviderAuthError extends Error {
  constructor(public readonly provider: ProviderName) {
    super(`No access token configured for provider "${provider}"`);
    this.name = 'MissingProviderAuthError';
  }
}

/** Optional knobs for tests: a stubbed fetch and sleep. */
export type ProviderCreateOpts = {
  fetch?: typeof fetch;
  sleep?: Sleep;
};

export function createTargetCatalog(config: WorkerConfig, opts: ProviderCreateOpts = {}): TargetCatalog {
  assertEnabled(config.providers, 'spotify');

  const token = config.spotify.accessToken;
  if (!token) {
    throw new MissingProviderAuthError('spotify');
  }

  return new SpotifyCatalog({
    auth: { token },
    baseUrl: config.spotify.baseUrl,
    market: config.spotify.market,
    searchLimit: config.spotify.searchLimit,
    fetch: opts.fetch,
    sleep: opts.sleep,
    cache: new InMemoryCache(),
  });
}

export function createSourceCatalog(config: WorkerConfig, files: readonly string[]): SourceCatalog {
  assertEnabled(config.providers, 'file');
  return createFileSource({ files });
}
