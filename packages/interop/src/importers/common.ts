import { URL } from 'node:url';

import type { Track } from '@tracksync/contracts';

/** A playlist file that cannot be turned into tracks; `details` carries the offending line or header. */
export class FileImportError extends Error {
  readonly code = 'invalid_playlist_file';

  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'FileImportError';
  }
}

const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

/** Splits "A; B", "A, B", "A & B" and "A feat. B" into separate names. */
export const splitArtists = (value: unknown): string[] => {
  if (typeof value !== 'string') return [];
  const normalized = normalizeWhitespace(value);
  if (!normalized) return [];

  const tokens = normalized
    .split(/;|,|(?:\s+&\s+)|(?:\s+feat\.?\s+)|(?:\s+ft\.?\s+)|(?:\s+featuring\s+)/i)
    .map((token) => normalizeWhitespace(token))
    .filter(Boolean);

  return tokens.length > 0 ? tokens : [normalized];
};

export const toNull = (value: unknown): string | null => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const parseInteger = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') return null;
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isFinite(num)) return null;
  return Math.trunc(num);
};

export const parseMilliseconds = (value: unknown): number | null => {
  const num = parseInteger(value);
  if (num === null || num < 0) return null;
  return num;
};

const stripSegment = (segment: string): string =>
  segment.split(/[?#]/, 1)[0]?.trim() ?? segment.trim();

/**
 * Canonical `spotify:track:<id>` for a Spotify URI or open.spotify.com link.
 * Links to other services yield null.
 */
export const parseTrackUri = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const uriMatch = /^spotify:track:([A-Za-z0-9]+)$/.exec(trimmed);
  if (uriMatch) return trimmed;

  try {
    const parsed = new URL(trimmed);
    if (!parsed.hostname.toLowerCase().endsWith('spotify.com')) return null;
    const segments = parsed.pathname.split('/').filter(Boolean).map(stripSegment);
    const idx = segments.indexOf('track');
    const id = idx >= 0 ? segments[idx + 1] : undefined;
    return id ? `spotify:track:${id}` : null;
  } catch {
    return null;
  }
};

export const ensureTracks = (tracks: Track[], context: string): Track[] => {
  if (tracks.length === 0) {
    throw new FileImportError(`${context} did not contain any tracks`);
  }
  return tracks;
};

export const ensureTitle = (value: string | null | undefined): string => {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new FileImportError('Playlist item is missing a title');
  }
  return trimmed;
};
