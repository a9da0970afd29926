import { ContractViolationError, type MatchResult, type MatchStatistics } from '@tracksync/contracts';

/** Share of results that carry a uri, 0..1. */
export function calculateMatchRate(results: readonly MatchResult[]): number {
  if (results.length === 0) return 0;
  const matched = results.filter((result) => result.uri !== null).length;
  return matched / results.length;
}

/**
 * Share of matched results whose uri differs from the expected one.
 * Matches without an expectation are not counted as false.
 */
export function calculateFalseMatchRate(
  results: readonly MatchResult[],
  expectedUris: readonly (string | null)[],
): number {
  if (results.length !== expectedUris.length) {
    throw new ContractViolationError('Number of results must match number of expected URIs');
  }

  let matched = 0;
  let falseMatches = 0;
  results.forEach((result, index) => {
    if (result.uri === null) return;
    matched += 1;
    const expected = expectedUris[index] ?? null;
    if (expected !== null && result.uri !== expected) {
      falseMatches += 1;
    }
  });

  return matched === 0 ? 0 : falseMatches / matched;
}

export function getMatchStatistics(results: readonly MatchResult[]): MatchStatistics {
  const byReason: MatchStatistics['byReason'] = {};
  let matched = 0;
  let notFound = 0;
  let ambiguous = 0;

  for (const result of results) {
    if (result.uri !== null) matched += 1;
    if (result.reason === 'not_found') notFound += 1;
    if (result.reason === 'ambiguous') ambiguous += 1;
    byReason[result.reason] = (byReason[result.reason] ?? 0) + 1;
  }

  return {
    total: results.length,
    matched,
    notFound,
    ambiguous,
    matchRate: results.length === 0 ? 0 : matched / results.length,
    byReason,
  };
}
