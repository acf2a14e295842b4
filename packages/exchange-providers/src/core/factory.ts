import { VENUE_IDS, type ExchangeCredentials, type VenueId } from '@coinbridge/core';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { createBinanceCatalogClient } from '../exchanges/binance/client.js';
import { createBitgetCatalogClient } from '../exchanges/bitget/client.js';
import { createBybitCatalogClient } from '../exchanges/bybit/client.js';

import type { IVenueCatalogClient, VenueClientOptions } from './types.js';

type VenueClientFactory = (
  credentials?: ExchangeCredentials,
  options?: VenueClientOptions
) => Result<IVenueCatalogClient, Error>;

/**
 * Every venue with a catalog integration. Keyed by the closed VenueId union,
 * so a missing entry is a compile error.
 */
const venueFactories: Record<VenueId, VenueClientFactory> = {
  binance: createBinanceCatalogClient,
  bybit: createBybitCatalogClient,
  bitget: createBitgetCatalogClient,
};

/**
 * Venues whose catalog endpoint works without credentials
 */
export const PUBLIC_CATALOG_VENUES: readonly VenueId[] = ['bitget'];

export function isVenueId(name: string): name is VenueId {
  return VENUE_IDS.some((venue) => venue === name);
}

/**
 * Create a catalog client for the specified venue.
 */
export function createVenueCatalogClient(
  venueName: string,
  credentials?: ExchangeCredentials,
  options: VenueClientOptions = {}
): Result<IVenueCatalogClient, Error> {
  const normalizedName = venueName.toLowerCase();

  if (isVenueId(normalizedName)) {
    return venueFactories[normalizedName](credentials, options);
  }
  return err(new Error(`Unknown venue: ${venueName}. Supported venues: ${VENUE_IDS.join(', ')}`));
}
