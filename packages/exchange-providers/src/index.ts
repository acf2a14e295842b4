/**
 * @coinbridge/exchange-providers
 *
 * Venue coin catalogs fetched through ccxt. ccxt only provides connectivity;
 * each client validates the venue's raw payload itself.
 */

// Core
export { createVenueCatalogClient, isVenueId, PUBLIC_CATALOG_VENUES } from './core/factory.js';
export { DEFAULT_FETCH_TIMEOUT_MS, fetchVenueCatalogs } from './core/catalog-fetcher.js';
export { inferDenomination, resolveContractAddress, stripDenominationPrefix } from './core/listing-utils.js';
export type {
  CatalogFetchResult,
  FetchCatalogOptions,
  IVenueCatalogClient,
  VenueClientOptions,
  VenueFetchError,
} from './core/types.js';

// Configuration
export {
  buildVenueClients,
  DEFAULT_CONFIG_FILENAME,
  loadVenueConfig,
  VenueConfigSchema,
  type SkippedVenue,
  type VenueClientSet,
  type VenueConfig,
} from './config/venue-config.js';

// Venues
export { createBinanceCatalogClient } from './exchanges/binance/client.js';
export { createBybitCatalogClient } from './exchanges/bybit/client.js';
export { createBitgetCatalogClient } from './exchanges/bitget/client.js';
