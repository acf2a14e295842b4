import type { VenueCatalog, VenueCoinListing, VenueId } from '@coinbridge/core';
import type { Result } from 'neverthrow';

/**
 * Read-only access to one venue's coin and network catalog.
 */
export interface IVenueCatalogClient {
  readonly venue: VenueId;

  /**
   * Whether the venue's catalog endpoint needs API credentials.
   */
  readonly requiresAuth: boolean;

  /**
   * Fetch every coin the venue lists, with per-network deposit and
   * withdrawal terms. Entries the venue returns in an unexpected shape are
   * skipped, not fatal.
   */
  fetchCatalog(): Promise<Result<VenueCoinListing[], Error>>;
}

/**
 * A venue whose catalog could not be fetched.
 */
export interface VenueFetchError {
  venue: VenueId;
  message: string;
}

export interface CatalogFetchResult {
  /** Keyed by venue id, in client order; failed venues map to [] */
  catalog: VenueCatalog;
  errors: VenueFetchError[];
}

/**
 * Settings applied to the venue's ccxt instance.
 */
export interface VenueClientOptions {
  /**
   * Request timeout in milliseconds, so an abandoned fetch does not outlive
   * the caller's deadline
   */
  timeoutMs?: number | undefined;
}

export interface FetchCatalogOptions {
  /**
   * Per-venue deadline in milliseconds
   */
  timeoutMs?: number | undefined;
}
