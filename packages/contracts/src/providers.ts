// packages/contracts/src/providers.ts

import type { Provider } from './constants';
import type { AddResult, Candidate, Collection, Track } from './tracks';

/** Canonical provider IDs used across the app */
export type ProviderName = Provider;

export type CatalogRole = 'source' | 'target';

/** Read capabilities every catalog offers. */
export interface SourceCatalog {
  readonly name: ProviderName;
  readonly role: CatalogRole;
  listOwnedCollections(): Promise<Collection[]>;
  /** Ordering must be stable across calls; resume depends on it. */
  listTracks(collectionId: string): Promise<Track[]>;
}

/** Read-write catalog that transfers are written into. */
export interface TargetCatalog extends SourceCatalog {
  readonly role: 'target';
  /** Up to topK candidates, sorted by confidence descending. */
  findCandidates(track: Track, topK?: number): Promise<Candidate[]>;
  resolveOrCreateCollection(name: string): Promise<Collection>;
  /**
   * Adds up to the provider's batch limit.
   * Rejects with RateLimitedError, NotFoundError or TemporaryFailureError.
   */
  addTracksBatch(collectionId: string, uris: readonly string[]): Promise<AddResult>;
}

export interface ProviderAuth {
  /** OAuth access token (bearer) */
  token: string;
}

export type ProviderErrorCode =
  | 'rate_limited'
  | 'temporary_failure'
  | 'permanent_failure'
  | 'not_found'
  | 'unsupported';

export class ProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly status?: number;

  constructor(code: ProviderErrorCode, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
    this.status = status;
  }
}

/** The provider asked us to wait before trying again. */
export class RateLimitedError extends ProviderError {
  constructor(public readonly retryAfterMs: number, message = 'Rate limited') {
    super('rate_limited', message, 429);
    this.name = 'RateLimitedError';
  }
}

export class TemporaryFailureError extends ProviderError {
  constructor(message: string, status?: number) {
    super('temporary_failure', message, status);
    this.name = 'TemporaryFailureError';
  }
}

/** Bad input or authorization; retrying will not help. */
export class PermanentFailureError extends ProviderError {
  constructor(message: string, status?: number) {
    super('permanent_failure', message, status);
    this.name = 'PermanentFailureError';
  }
}

export class NotFoundError extends ProviderError {
  constructor(message: string) {
    super('not_found', message, 404);
    this.name = 'NotFoundError';
  }
}

export class UnsupportedOperationError extends ProviderError {
  constructor(public readonly provider: ProviderName, public readonly operation: string, role: CatalogRole) {
    super('unsupported', `${operation} is unsupported for the ${role} role of provider "${provider}"`);
    this.name = 'UnsupportedOperationError';
  }
}

/** Caller broke an API contract (mismatched inputs, invalid sizes). Never retried. */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export const isRateLimited = (error: unknown): error is RateLimitedError =>
  error instanceof RateLimitedError;
