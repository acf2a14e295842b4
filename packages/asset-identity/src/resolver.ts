import type { ResolutionResult, VenueCatalogInput } from '@coinbridge/core';
import { getLogger } from '@coinbridge/logger';

import { ContractIdentityIndex } from './matching/contract-identity-index.js';
import { matchByContractClosure } from './matching/contract-closure-matcher.js';
import { mergeMatches } from './matching/result-merger.js';
import { matchTraditional } from './matching/traditional-matcher.js';
import { defaultNetworkStandardizer, type NetworkNameStandardizer } from './network/network-standardizer.js';

const logger = getLogger('AssetIdentityResolver');

export interface ResolveOptions {
  standardizer?: NetworkNameStandardizer | undefined;
}

/**
 * Resolve a user-supplied symbol to every (venue, symbol, network) listing of
 * the same asset in `catalog`.
 *
 * Pure computation over the snapshot it is given; an empty catalog or a venue
 * with no listings simply contributes nothing.
 */
export function resolve(
  querySymbol: string,
  catalog: VenueCatalogInput,
  options: ResolveOptions = {}
): ResolutionResult {
  const standardizer = options.standardizer ?? defaultNetworkStandardizer;
  const query = querySymbol.trim();

  const index = ContractIdentityIndex.build(catalog, standardizer);
  const traditional = matchTraditional(query, catalog);
  const { matches: smart, trace } = matchByContractClosure(query, catalog, index, standardizer, traditional);

  logger.debug(
    {
      query,
      contractKeys: index.size,
      seedContracts: trace.seedContracts.size,
      relatedSymbols: [...trace.relatedSymbols],
      expandedContracts: trace.expandedContracts.size,
      traditional: traditional.length,
      smart: smart.length,
    },
    'Resolved asset identity'
  );

  const notes = [
    `index: ${index.size} contract keys`,
    `traditional: ${traditional.length} records`,
    `smart: ${smart.length} records`,
  ];
  if (trace.relatedSymbols.size > 0) {
    notes.push(`related symbols: ${[...trace.relatedSymbols].join(', ')}`);
  }

  return mergeMatches(querySymbol, traditional, smart, notes);
}

/**
 * Holds one standardizer for callers that resolve repeatedly.
 */
export class AssetIdentityResolver {
  constructor(private readonly standardizer: NetworkNameStandardizer = defaultNetworkStandardizer) {}

  resolve(querySymbol: string, catalog: VenueCatalogInput): ResolutionResult {
    return resolve(querySymbol, catalog, { standardizer: this.standardizer });
  }

  standardizeNetwork(label: string): string {
    return this.standardizer.standardize(label);
  }
}
