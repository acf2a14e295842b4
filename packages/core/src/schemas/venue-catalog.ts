import { z } from 'zod';

import { DecimalSchema, NonEmptyStringSchema } from './primitives.js';

/**
 * Venues with a catalog integration. The set is closed; adding a venue means
 * adding a client and a factory entry, never a runtime lookup by name.
 */
export const VENUE_IDS = ['binance', 'bybit', 'bitget'] as const;

export const VenueIdSchema = z.enum(VENUE_IDS);

export type VenueId = z.infer<typeof VenueIdSchema>;

/**
 * One network's terms for one coin on one venue.
 * `network` is the label exactly as the venue spells it.
 */
export const VenueNetworkListingSchema = z.object({
  network: z.string(),
  contractAddress: z.string().optional(),
  depositEnabled: z.boolean(),
  withdrawalEnabled: z.boolean(),
  minWithdrawal: DecimalSchema,
  // -1 when the venue does not support withdrawals on this network
  withdrawalFee: DecimalSchema,
  chainType: z.string().optional(),
  explorerUrl: z.string().optional(),
});

export type VenueNetworkListing = z.infer<typeof VenueNetworkListingSchema>;

/**
 * One coin on one venue. `denomination` > 1 means the listed ticker stands for
 * that many base units per displayed unit (1000SATS, 1MBABYDOGE).
 */
export const VenueCoinListingSchema = z.object({
  venue: NonEmptyStringSchema,
  symbol: NonEmptyStringSchema,
  name: z.string(),
  denomination: z.number().int().positive().optional(),
  networks: z.array(VenueNetworkListingSchema),
});

export type VenueCoinListing = z.infer<typeof VenueCoinListingSchema>;

/**
 * Full catalog keyed by venue identifier. Key insertion order is the venue
 * order every consumer iterates in.
 */
export type VenueCatalog = Record<string, readonly VenueCoinListing[]>;

/**
 * Catalog input accepted by the resolver: a plain record or a Map.
 */
export type VenueCatalogInput = VenueCatalog | ReadonlyMap<string, readonly VenueCoinListing[]>;

/**
 * Iterate a catalog in venue insertion order regardless of container type.
 */
export function catalogEntries(catalog: VenueCatalogInput): [string, readonly VenueCoinListing[]][] {
  if (isCatalogMap(catalog)) {
    return [...catalog.entries()];
  }
  return Object.entries(catalog);
}

function isCatalogMap(catalog: VenueCatalogInput): catalog is ReadonlyMap<string, readonly VenueCoinListing[]> {
  return catalog instanceof Map;
}

/**
 * Generic exchange credentials type.
 * Each venue client validates its own required fields via Zod schemas.
 */
export type ExchangeCredentials = Record<string, string>;
