import type { Track } from '@tracksync/contracts';

export const DEFAULT_DURATION_TOLERANCE_MS = 2000;

/** Tokens that carry no artist identity ("Vol. 2", "Live", "Remastered"). */
const ARTIST_STOP_TOKENS = new Set(['vol', 'pt', 'remaster', 'remastered', 'live', 'edit']);

// `ft` only counts with its dot, so names like "FT Island" survive.
const FEAT_PATTERN = /\bfeat\b\.?|\bft\./g;
const BRACKETED_SEGMENT_PATTERN = /\s*[([{][^)\]}]*[)\]}]\s*/g;
const BRACKET_CHARS_PATTERN = /[()[\]{}]/g;
const NON_WORD_PATTERN = /[^\p{L}\p{N}\s]/gu;
const NUMERIC_TOKEN_PATTERN = /^\p{Nd}+$/u;

function stripDiacritics(value: string): string {
  return value.normalize('NFKD').replace(/\p{M}/gu, '');
}

/**
 * Canonical comparable form of free-text metadata.
 *
 * Bracketed segments are removed repeatedly until none are left, so
 * `"Song (Live (2010 Remaster))"` becomes `"song"`.
 */
export function normalizeString(value: string | null | undefined): string {
  let text = stripDiacritics(value ?? '').toLowerCase();
  text = text.replace(/&/g, ' and ');
  text = text.replace(FEAT_PATTERN, ' ');

  let previous: string;
  do {
    previous = text;
    text = text.replace(BRACKETED_SEGMENT_PATTERN, ' ');
  } while (text !== previous);

  return text
    .replace(BRACKET_CHARS_PATTERN, ' ')
    .replace(NON_WORD_PATTERN, ' ')
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function stripLeadingArticle(name: string): string {
  return name.startsWith('the ') ? name.slice(4) : name;
}

/** Order-insensitive artist string: `["The Beatles", "John Lennon"]` → `"beatles john lennon"`. */
export function normalizeArtists(artists: readonly string[] | null | undefined): string {
  return (artists ?? [])
    .filter(Boolean)
    .map((artist) => stripLeadingArticle(normalizeString(artist)))
    .filter((name) => name.length > 0)
    .sort()
    .join(' ');
}

export function artistTokens(artists: readonly string[] | null | undefined): Set<string> {
  const tokens = new Set<string>();
  for (const token of normalizeArtists(artists).split(' ')) {
    if (!token) continue;
    if (NUMERIC_TOKEN_PATTERN.test(token)) continue;
    if (ARTIST_STOP_TOKENS.has(token)) continue;
    tokens.add(token);
  }
  return tokens;
}

// Ties go to the even bucket: 1000ms with a 2000ms window lands on 0, 3000ms on 4000.
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Snap a duration to the nearest multiple of the tolerance window. */
export function roundDuration(durationMs: number, toleranceMs = DEFAULT_DURATION_TOLERANCE_MS): number {
  if (!Number.isFinite(durationMs) || durationMs < 0) return 0;
  const bucket = Math.max(1, toleranceMs);
  return roundHalfEven(durationMs / bucket) * bucket;
}

/**
 * Stable identity for a track. An ISRC alone decides identity; without one the
 * key is built from normalized title, artists and bucketed duration.
 */
export function buildIdentityKey(
  track: Pick<Track, 'title' | 'artists' | 'durationMs' | 'isrc'>,
  toleranceMs = DEFAULT_DURATION_TOLERANCE_MS,
): string {
  if (track.isrc) {
    return `isrc:${track.isrc}`;
  }
  const title = normalizeString(track.title);
  const artists = normalizeArtists(track.artists);
  const duration = roundDuration(track.durationMs, toleranceMs);
  return `meta:${title}::${artists}::${duration}`;
}
