import { parseDecimal, type VenueCoinListing, type VenueNetworkListing } from '@coinbridge/core';

export function network(label: string, contractAddress?: string, overrides: Partial<VenueNetworkListing> = {}) {
  const listing: VenueNetworkListing = {
    network: label,
    contractAddress,
    depositEnabled: true,
    withdrawalEnabled: true,
    minWithdrawal: parseDecimal('10'),
    withdrawalFee: parseDecimal('1'),
    ...overrides,
  };
  return listing;
}

export function coin(
  venue: string,
  symbol: string,
  networks: VenueNetworkListing[],
  denomination?: number
): VenueCoinListing {
  return { venue, symbol, name: symbol, denomination, networks };
}
