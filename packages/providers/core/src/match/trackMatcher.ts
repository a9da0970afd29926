import {
  ContractViolationError,
  isMatchReason,
  POSITIVE_MATCH_REASONS,
  type Candidate,
  type MatchReason,
  type MatchResult,
  type RiskMode,
  type Track,
} from '@tracksync/contracts';

import { BALANCED_MIN_CONFIDENCE, resolveMatcherConfig, type MatcherConfig } from '../config';
import { artistTokens, normalizeString } from './normalize';

/** Rank used for candidates the provider did not rank. */
const UNRANKED = Number.MAX_SAFE_INTEGER;

const NOT_FOUND: MatchResult = { uri: null, confidence: 0, reason: 'not_found' };

interface SelectionContext {
  title: string;
  artistTokens: Set<string>;
  album: string | null;
}

/**
 * One narrowing step. Returns the narrowed pool, or null to keep the pool unchanged.
 */
type PoolStep = (pool: Candidate[], context: SelectionContext) => Candidate[] | null;

function hasArtistOverlap(candidate: Candidate, context: SelectionContext): boolean {
  const tokens = artistTokens(candidate.artists);
  if (context.artistTokens.size === 0) {
    return tokens.size > 0;
  }
  for (const token of tokens) {
    if (context.artistTokens.has(token)) return true;
  }
  return false;
}

const fullTextStep: PoolStep = (pool, context) => {
  const fullText = pool.filter(
    (candidate) => normalizeString(candidate.title) === context.title && hasArtistOverlap(candidate, context),
  );
  if (fullText.length > 0) return fullText;
  return pool.filter((candidate) => hasArtistOverlap(candidate, context));
};

const albumStep: PoolStep = (pool, context) => {
  if (!context.album || pool.length === 0) return null;
  const sameAlbum = pool.filter((candidate) => normalizeString(candidate.album) === context.album);
  return sameAlbum.length > 0 ? sameAlbum : null;
};

const rankStep: PoolStep = (pool) =>
  [...pool].sort((a, b) => {
    const rankA = typeof a.rank === 'number' && Number.isInteger(a.rank) ? a.rank : UNRANKED;
    const rankB = typeof b.rank === 'number' && Number.isInteger(b.rank) ? b.rank : UNRANKED;
    if (rankA !== rankB) return rankA - rankB;
    return b.confidence - a.confidence;
  });

/** Metadata-first selection, in tie-break order. */
export const SELECTION_STEPS: readonly PoolStep[] = [fullTextStep, albumStep, rankStep];

export function selectByMetadata(source: Track, candidates: readonly Candidate[]): Candidate | null {
  if (!source.title || source.artists.length === 0) return null;

  const context: SelectionContext = {
    title: normalizeString(source.title),
    artistTokens: artistTokens(source.artists),
    album: source.album ? normalizeString(source.album) : null,
  };

  let pool = [...candidates];
  for (const step of SELECTION_STEPS) {
    pool = step(pool, context) ?? pool;
    if (pool.length === 0) return null;
  }
  return pool[0] ?? null;
}

export function selectByConfidence(candidates: readonly Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (!best || candidate.confidence > best.confidence) {
      best = candidate;
    }
  }
  return best;
}

export function minimumConfidence(riskMode: RiskMode, fuzzyThreshold: number): number {
  switch (riskMode) {
    case 'strict':
      return fuzzyThreshold;
    case 'balanced':
      return BALANCED_MIN_CONFIDENCE;
    default:
      return 0;
  }
}

function toPositiveReason(candidate: Candidate, exactThreshold: number): MatchReason {
  if (isMatchReason(candidate.reason) && POSITIVE_MATCH_REASONS.has(candidate.reason)) {
    return candidate.reason;
  }
  return candidate.confidence >= exactThreshold ? 'exact_match' : 'fuzzy_match';
}

/**
 * Picks the single best target candidate for a source track.
 *
 * Selection is metadata first (title + artist overlap, then artist overlap
 * alone, album as a tie-break, then provider rank and confidence) and falls
 * back to the highest-confidence candidate. The risk mode floor is applied
 * only to the selected candidate.
 */
export class TrackMatcher {
  readonly config: MatcherConfig;

  constructor(config: Partial<MatcherConfig> = {}) {
    this.config = resolveMatcherConfig(config);
  }

  findBestMatch(source: Track, candidates: readonly Candidate[]): MatchResult {
    if (candidates.length === 0) {
      return { ...NOT_FOUND };
    }

    const selected = selectByMetadata(source, candidates) ?? selectByConfidence(candidates);
    if (!selected) {
      return { ...NOT_FOUND };
    }

    const reason = toPositiveReason(selected, this.config.exactThreshold);
    // An ISRC hit is authoritative whatever score the provider attached to it.
    const confidence = reason === 'isrc_exact' ? 1 : selected.confidence;

    const floor = minimumConfidence(this.config.riskMode, this.config.fuzzyThreshold);
    if (confidence < floor) {
      return { ...NOT_FOUND };
    }

    return { uri: selected.uri, confidence, reason };
  }

  matchBatch(sources: readonly Track[], candidateLists: readonly (readonly Candidate[])[]): MatchResult[] {
    if (sources.length !== candidateLists.length) {
      throw new ContractViolationError(
        `Number of source tracks (${sources.length}) must match number of candidate lists (${candidateLists.length})`,
      );
    }
    return sources.map((source, index) => this.findBestMatch(source, candidateLists[index] ?? []));
  }
}
