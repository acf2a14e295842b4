import fs from 'node:fs';
import path from 'node:path';

import {
  formatZodIssues,
  fromZod,
  getErrorMessage,
  VENUE_IDS,
  VenueIdSchema,
  type ExchangeCredentials,
  type VenueId,
} from '@coinbridge/core';
import { getLogger } from '@coinbridge/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { DEFAULT_FETCH_TIMEOUT_MS } from '../core/catalog-fetcher.js';
import { createVenueCatalogClient, PUBLIC_CATALOG_VENUES } from '../core/factory.js';
import type { IVenueCatalogClient, VenueClientOptions } from '../core/types.js';

export const DEFAULT_CONFIG_FILENAME = 'coinbridge.config.json';

export const VenueConfigSchema = z
  .object({
    enabledVenues: z
      .array(VenueIdSchema)
      .min(1, 'at least one venue must be enabled')
      .default([...VENUE_IDS])
      .transform((venues) => [...new Set(venues)]),
    fetchTimeoutMs: z.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  })
  .strict();

export type VenueConfig = z.infer<typeof VenueConfigSchema>;

export interface SkippedVenue {
  venue: VenueId;
  reason: string;
}

export interface VenueClientSet {
  clients: IVenueCatalogClient[];
  skipped: SkippedVenue[];
}

const logger = getLogger('VenueConfig');

function defaultVenueConfig(): VenueConfig {
  return { enabledVenues: [...VENUE_IDS], fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load venue configuration.
 * A missing file is not an error: every venue is enabled with the default timeout.
 */
export function loadVenueConfig(configPath?: string): Result<VenueConfig, Error> {
  const finalPath = configPath
    ? path.resolve(process.cwd(), configPath)
    : path.join(process.cwd(), DEFAULT_CONFIG_FILENAME);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(finalPath, 'utf-8'));
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug(`No venue config at ${finalPath}, using defaults`);
      return ok(defaultVenueConfig());
    }
    return err(new Error(`Failed to load venue configuration from ${finalPath}: ${getErrorMessage(error)}`));
  }

  return fromZod(VenueConfigSchema, raw).mapErr(
    (error) => new Error(`Invalid venue configuration in ${finalPath}:\n${formatZodIssues(error)}`)
  );
}

/**
 * Create a client for every enabled venue that can be queried: venues with
 * credentials, plus venues whose catalog is public. A public venue whose
 * credentials are rejected is still queried without them.
 */
export function buildVenueClients(
  config: VenueConfig,
  credentials: Partial<Record<VenueId, ExchangeCredentials>>,
  options: VenueClientOptions = { timeoutMs: config.fetchTimeoutMs }
): VenueClientSet {
  const clients: IVenueCatalogClient[] = [];
  const skipped: SkippedVenue[] = [];

  for (const venue of config.enabledVenues) {
    const venueCredentials = credentials[venue];
    if (!venueCredentials && !PUBLIC_CATALOG_VENUES.includes(venue)) {
      skipped.push({ venue, reason: 'no API credentials configured' });
      continue;
    }

    let result = createVenueCatalogClient(venue, venueCredentials, options);
    if (result.isErr() && venueCredentials && PUBLIC_CATALOG_VENUES.includes(venue)) {
      logger.warn(`Ignoring ${venue} credentials, querying its public catalog instead: ${result.error.message}`);
      result = createVenueCatalogClient(venue, undefined, options);
    }
    if (result.isErr()) {
      skipped.push({ venue, reason: result.error.message });
      continue;
    }
    clients.push(result.value);
  }

  if (skipped.length > 0) {
    logger.info(`Skipping venues: ${skipped.map((entry) => entry.venue).join(', ')}`);
  }

  return { clients, skipped };
}
