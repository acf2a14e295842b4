import { catalogEntries, type MatchRecord, type VenueCatalogInput } from '@coinbridge/core';

import { matchesDenomination } from './denomination.js';

/**
 * Literal and denomination-aware symbol matching.
 *
 * Per venue only the first matching coin counts: a venue is assumed not to
 * list the same base asset twice under different denominations. Records carry
 * the symbol the venue actually lists, which differs from the query for
 * denomination matches.
 */
export function matchTraditional(querySymbol: string, catalog: VenueCatalogInput): MatchRecord[] {
  const records: MatchRecord[] = [];

  for (const [venue, coins] of catalogEntries(catalog)) {
    const coin = coins.find((candidate) => matchesDenomination(candidate.symbol, candidate.denomination, querySymbol));
    if (!coin) continue;

    for (const listing of coin.networks) {
      records.push(
        Object.freeze({
          venue,
          symbol: coin.symbol,
          network: listing.network,
          contractAddress: listing.contractAddress ?? '',
          verified: true,
          source: 'traditional' as const,
        })
      );
    }
  }

  return records;
}
