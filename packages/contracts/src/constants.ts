export const PROVIDER_NAMES = ['spotify', 'file'] as const;
export type Provider = (typeof PROVIDER_NAMES)[number];

export const MATCH_REASONS = [
  'isrc_exact',
  'exact_match',
  'fuzzy_match',
  'not_found',
  'ambiguous',
  'error',
] as const;

export const RISK_MODES = ['strict', 'balanced', 'aggressive'] as const;

export const CHECKPOINT_STAGES = ['scanning', 'matching', 'writing', 'completed'] as const;

/** Largest batch accepted by target add-items endpoints. */
export const MAX_BATCH_SIZE = 100;
