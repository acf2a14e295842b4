import { getErrorMessage, type VenueCoinListing } from '@coinbridge/core';
import { getLogger } from '@coinbridge/logger';
import type { Result } from 'neverthrow';

import type { CatalogFetchResult, FetchCatalogOptions, IVenueCatalogClient, VenueFetchError } from './types.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

const logger = getLogger('CatalogFetcher');

class VenueTimeoutError extends Error {
  constructor(venue: string, timeoutMs: number) {
    super(`${venue} catalog fetch timed out after ${timeoutMs}ms`);
    this.name = 'VenueTimeoutError';
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, venue: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new VenueTimeoutError(venue, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetch every client's catalog concurrently.
 *
 * Never rejects. A venue that fails, throws or misses the deadline contributes
 * an empty catalog and one entry in `errors`; the others are unaffected.
 * Catalog keys follow client order.
 */
export async function fetchVenueCatalogs(
  clients: readonly IVenueCatalogClient[],
  options: FetchCatalogOptions = {}
): Promise<CatalogFetchResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  const settled = await Promise.allSettled(
    clients.map((client) => withTimeout(client.fetchCatalog(), timeoutMs, client.venue))
  );

  const result: CatalogFetchResult = { catalog: {}, errors: [] };

  settled.forEach((outcome, index) => {
    const client = clients[index];
    if (!client) return;

    const failure = toFetchError(client, outcome);
    if (failure) {
      logger.warn({ venue: failure.venue }, `Catalog fetch failed: ${failure.message}`);
      result.catalog[client.venue] = [];
      result.errors.push(failure);
      return;
    }

    if (outcome.status === 'fulfilled' && outcome.value.isOk()) {
      result.catalog[client.venue] = outcome.value.value;
      logger.info(`Fetched ${outcome.value.value.length} coins from ${client.venue}`);
    }
  });

  return result;
}

function toFetchError(
  client: IVenueCatalogClient,
  outcome: PromiseSettledResult<Result<VenueCoinListing[], Error>>
): VenueFetchError | undefined {
  if (outcome.status === 'rejected') {
    return { venue: client.venue, message: getErrorMessage(outcome.reason) };
  }
  if (outcome.value.isErr()) {
    return { venue: client.venue, message: outcome.value.error.message };
  }
  return undefined;
}
