import { RISK_MODES, type RiskMode } from '@tracksync/contracts';

/**
 * Matcher configuration
 */
export interface MatcherConfig {
  /**
   * Minimum confidence a candidate needs to be labelled an exact match
   * @default 0.95
   */
  exactThreshold: number;

  /**
   * Minimum confidence for fuzzy matches; also the acceptance floor in strict mode
   * @default 0.85
   */
  fuzzyThreshold: number;

  /**
   * Confidence gap under which two candidates count as a near tie.
   * Kept for configuration compatibility; selection never stops on ties.
   * @default 0.05
   */
  ambiguousThreshold: number;

  /**
   * Acceptance floor policy applied after selection
   * @default 'strict'
   */
  riskMode: RiskMode;
}

/** Acceptance floor for balanced mode. */
export const BALANCED_MIN_CONFIDENCE = 0.8;

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  exactThreshold: 0.95,
  fuzzyThreshold: 0.85,
  ambiguousThreshold: 0.05,
  riskMode: 'strict',
};

/** Unrecognized modes impose no floor, same as aggressive. */
export function parseRiskMode(value: string | undefined | null): RiskMode | undefined {
  if (!value || !value.trim()) return undefined;
  const normalized = value.trim().toLowerCase();
  return RISK_MODES.find((mode) => mode === normalized) ?? 'aggressive';
}

/**
 * Get matcher configuration from environment variables
 */
export function getMatcherConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<MatcherConfig> {
  return {
    exactThreshold: envNumber(env, 'TRACKSYNC_EXACT_THRESHOLD'),
    fuzzyThreshold: envNumber(env, 'TRACKSYNC_FUZZY_THRESHOLD'),
    ambiguousThreshold: envNumber(env, 'TRACKSYNC_AMBIGUOUS_THRESHOLD'),
    riskMode: parseRiskMode(env.TRACKSYNC_RISK_MODE),
  };
}

/**
 * Merge matcher config with defaults; explicit overrides win over the environment.
 */
export function resolveMatcherConfig(
  overrides: Partial<MatcherConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): MatcherConfig {
  const fromEnv = getMatcherConfigFromEnv(env);
  return {
    exactThreshold: overrides.exactThreshold ?? fromEnv.exactThreshold ?? DEFAULT_MATCHER_CONFIG.exactThreshold,
    fuzzyThreshold: overrides.fuzzyThreshold ?? fromEnv.fuzzyThreshold ?? DEFAULT_MATCHER_CONFIG.fuzzyThreshold,
    ambiguousThreshold:
      overrides.ambiguousThreshold ?? fromEnv.ambiguousThreshold ?? DEFAULT_MATCHER_CONFIG.ambiguousThreshold,
    riskMode: overrides.riskMode ?? fromEnv.riskMode ?? DEFAULT_MATCHER_CONFIG.riskMode,
  };
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}
