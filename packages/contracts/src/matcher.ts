import type { MATCH_REASONS, RISK_MODES } from './constants';

export type MatchReason = (typeof MATCH_REASONS)[number];

export type RiskMode = (typeof RISK_MODES)[number];

export type MatchResult = {
  uri: string | null;
  confidence: number;
  reason: MatchReason;
};

export type MatchStatistics = {
  total: number;
  matched: number;
  notFound: number;
  ambiguous: number;
  matchRate: number;
  byReason: Partial<Record<MatchReason, number>>;
};

/** Reasons under which a match result carries a uri. */
export const POSITIVE_MATCH_REASONS: ReadonlySet<MatchReason> = new Set<MatchReason>([
  'isrc_exact',
  'exact_match',
  'fuzzy_match',
]);

export function isMatchReason(value: string): value is MatchReason {
  return (
    value === 'isrc_exact' ||
    value === 'exact_match' ||
    value === 'fuzzy_match' ||
    value === 'not_found' ||
    value === 'ambiguous' ||
    value === 'error'
  );
}
