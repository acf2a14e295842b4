import type { MatchRecord, ResolutionResult } from '@coinbridge/core';

function mergeKey(match: MatchRecord): string {
  if (match.contractAddress.trim()) {
    return JSON.stringify([match.venue, match.symbol, match.network, match.contractAddress.toLowerCase()]);
  }
  return JSON.stringify([match.venue, match.symbol, match.network]);
}

/**
 * Stable dedup: the first record under each key survives, in input order.
 * Idempotent.
 */
export function dedupeMatches(matches: readonly MatchRecord[]): MatchRecord[] {
  const seen = new Set<string>();
  const kept: MatchRecord[] = [];

  for (const match of matches) {
    const key = mergeKey(match);
    if (seen.has(key)) continue;

    seen.add(key);
    kept.push(match);
  }

  return kept;
}

/**
 * Traditional matches first so literal matches lead in display order.
 */
export function mergeMatches(
  querySymbol: string,
  traditional: readonly MatchRecord[],
  smart: readonly MatchRecord[],
  notes: readonly string[] = []
): ResolutionResult {
  return {
    originalSymbol: querySymbol,
    verifiedMatches: dedupeMatches([...traditional, ...smart]),
    possibleMatches: [],
    notes: [...notes],
  };
}
