import { catalogEntries, type VenueCatalogInput, type VenueCoinListing } from '@coinbridge/core';

import { matchesDenomination } from './denomination.js';

export interface VenueCoinMatch {
  readonly venue: string;
  readonly coin: VenueCoinListing;
}

/**
 * Every coin, across every venue, whose listed symbol denotes `querySymbol`,
 * in catalog order. A venue may contribute more than one coin.
 */
export function* walkDenominationMatches(querySymbol: string, catalog: VenueCatalogInput): Generator<VenueCoinMatch> {
  for (const [venue, coins] of catalogEntries(catalog)) {
    for (const coin of coins) {
      if (matchesDenomination(coin.symbol, coin.denomination, querySymbol)) {
        yield { venue, coin };
      }
    }
  }
}

/**
 * Identity of a (venue, symbol, network) triple, exact case.
 */
export function tripleKey(venue: string, symbol: string, network: string): string {
  return JSON.stringify([venue, symbol, network]);
}
