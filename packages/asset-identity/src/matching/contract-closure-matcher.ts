import { catalogEntries, type MatchRecord, type VenueCatalogInput } from '@coinbridge/core';

import type { NetworkNameStandardizer } from '../network/network-standardizer.js';

import type { ContractIdentityIndex } from './contract-identity-index.js';
import { buildContractKey } from './contract-key.js';
import { tripleKey, walkDenominationMatches } from './denomination-walk.js';

export interface ContractClosureTrace {
  seedContracts: ReadonlySet<string>;
  relatedSymbols: ReadonlySet<string>;
  expandedContracts: ReadonlySet<string>;
}

export interface ContractClosureOutcome {
  matches: MatchRecord[];
  trace: ContractClosureTrace;
}

/**
 * "Smart" matching through shared contract identity.
 *
 * Stage one collects the contract keys of every listing the query matches by
 * symbol and the symbols that share those keys. Stage two pulls in every
 * network of those related symbols. Expansion stops there: a third hop is
 * never taken.
 *
 * Triples already found by symbol matching are excluded, so each listing has a
 * single provenance.
 */
export function matchByContractClosure(
  querySymbol: string,
  catalog: VenueCatalogInput,
  index: ContractIdentityIndex,
  standardizer: NetworkNameStandardizer,
  traditionalMatches: readonly MatchRecord[] = []
): ContractClosureOutcome {
  const alreadyFound = new Set<string>(
    traditionalMatches.map((match) => tripleKey(match.venue, match.symbol, match.network))
  );
  const seedContracts = new Set<string>();

  for (const { venue, coin } of walkDenominationMatches(querySymbol, catalog)) {
    for (const listing of coin.networks) {
      alreadyFound.add(tripleKey(venue, coin.symbol, listing.network));

      const key = buildContractKey(listing.contractAddress, listing.network, standardizer);
      if (key) seedContracts.add(key);
    }
  }

  const relatedSymbols = new Set<string>();
  for (const key of seedContracts) {
    for (const entry of index.entriesFor(key)) {
      relatedSymbols.add(entry.symbol.toUpperCase());
    }
  }

  const expandedContracts = new Set<string>();
  for (const [, coins] of catalogEntries(catalog)) {
    for (const coin of coins) {
      if (!relatedSymbols.has(coin.symbol.toUpperCase())) continue;

      for (const listing of coin.networks) {
        const key = buildContractKey(listing.contractAddress, listing.network, standardizer);
        if (key) expandedContracts.add(key);
      }
    }
  }

  const matches: MatchRecord[] = [];
  for (const key of expandedContracts) {
    for (const entry of index.entriesFor(key)) {
      if (alreadyFound.has(tripleKey(entry.venue, entry.symbol, entry.network))) continue;

      matches.push(
        Object.freeze({
          venue: entry.venue,
          symbol: entry.symbol,
          network: entry.network,
          contractAddress: entry.contractAddress,
          verified: true,
          source: 'smart' as const,
        })
      );
    }
  }

  return {
    matches,
    trace: { seedContracts, relatedSymbols, expandedContracts },
  };
}
