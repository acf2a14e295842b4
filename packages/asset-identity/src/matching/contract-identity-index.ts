import { catalogEntries, type VenueCatalogInput } from '@coinbridge/core';

import { defaultNetworkStandardizer, type NetworkNameStandardizer } from '../network/network-standardizer.js';

import { buildContractKey, normalizeContractAddress } from './contract-key.js';

export interface ContractIndexEntry {
  readonly venue: string;
  readonly symbol: string;
  /** Network label as the venue spells it */
  readonly network: string;
  /** Normalized (lower-cased) contract address */
  readonly contractAddress: string;
}

const EMPTY_ENTRIES: readonly ContractIndexEntry[] = Object.freeze([]);
const EMPTY_KEYS: ReadonlySet<string> = new Set();

/**
 * ContractKey -> every (venue, symbol, network) listing that shares it.
 *
 * Entry lists keep catalog order (venue, then coin, then network); the smart
 * matcher's output order depends on it.
 */
export class ContractIdentityIndex {
  private constructor(
    private readonly entriesByKey: ReadonlyMap<string, readonly ContractIndexEntry[]>,
    private readonly keysBySymbol: ReadonlyMap<string, ReadonlySet<string>>
  ) {}

  static build(
    catalog: VenueCatalogInput,
    standardizer: NetworkNameStandardizer = defaultNetworkStandardizer
  ): ContractIdentityIndex {
    const entriesByKey = new Map<string, ContractIndexEntry[]>();
    const keysBySymbol = new Map<string, Set<string>>();

    for (const [venue, coins] of catalogEntries(catalog)) {
      for (const coin of coins) {
        for (const listing of coin.networks) {
          const contractAddress = normalizeContractAddress(listing.contractAddress);
          const key = buildContractKey(contractAddress, listing.network, standardizer);
          if (!contractAddress || !key) continue;

          const entries = entriesByKey.get(key) ?? [];
          entries.push(Object.freeze({ venue, symbol: coin.symbol, network: listing.network, contractAddress }));
          entriesByKey.set(key, entries);

          const symbolKey = coin.symbol.toUpperCase();
          const symbolKeys = keysBySymbol.get(symbolKey) ?? new Set<string>();
          symbolKeys.add(key);
          keysBySymbol.set(symbolKey, symbolKeys);
        }
      }
    }

    return new ContractIdentityIndex(entriesByKey, keysBySymbol);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  keys(): string[] {
    return [...this.entriesByKey.keys()];
  }

  entriesFor(key: string): readonly ContractIndexEntry[] {
    return this.entriesByKey.get(key) ?? EMPTY_ENTRIES;
  }

  /**
   * Keys touched by listings whose symbol equals `symbol` (case-insensitive).
   * Not denomination-aware: "1000SATS" does not answer for "SATS".
   */
  keysForSymbol(symbol: string): ReadonlySet<string> {
    return this.keysBySymbol.get(symbol.toUpperCase()) ?? EMPTY_KEYS;
  }
}
