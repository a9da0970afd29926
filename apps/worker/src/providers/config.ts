import type { ProviderName } from '@tracksync/contracts';

import type { ProviderFlags } from '../config';

export class ProviderDisabledError extends Error {
  constructor(public readonly provider: ProviderName) {
    super(`Provider "${provider}" is disabled by feature flag`);
    this.name = 'ProviderDisabledError';
  }
}

export function assertEnabled(flags: ProviderFlags, name: ProviderName): void {
  if (!flags[name]) {
    throw new ProviderDisabledError(name);
  }
}
