// Imperative shell for the resolve command
// Loads configuration, fetches venue catalogs, then hands off to the pure resolver

import { AssetIdentityResolver } from '@coinbridge/asset-identity';
import { getErrorMessage, type ExchangeCredentials, type ResolutionResult, type VenueId } from '@coinbridge/core';
import { getConfigPath, getVenueCredentials } from '@coinbridge/env';
import {
  buildVenueClients,
  fetchVenueCatalogs,
  loadVenueConfig,
  type SkippedVenue,
  type VenueFetchError,
} from '@coinbridge/exchange-providers';
import { getLogger } from '@coinbridge/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { CliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';

import { attachNetworkTerms, type ResolvedMatch } from './resolve-utils.js';

const logger = getLogger('ResolveHandler');

export interface ResolveParams {
  symbol: string;
  configPath?: string | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Result data for the resolve command.
 */
export interface ResolveCommandResult {
  resolution: ResolutionResult;
  // verifiedMatches with the transfer terms of each matched network
  matches: ResolvedMatch[];
  venues: VenueId[];
  venueErrors: VenueFetchError[];
  skippedVenues: SkippedVenue[];
}

/**
 * Collaborators the handler reaches outside the process through.
 */
export interface ResolveHandlerDeps {
  loadConfig: typeof loadVenueConfig;
  getCredentials: () => Partial<Record<VenueId, ExchangeCredentials>>;
  getDefaultConfigPath: () => string;
  buildClients: typeof buildVenueClients;
  fetchCatalogs: typeof fetchVenueCatalogs;
}

const defaultDeps: ResolveHandlerDeps = {
  loadConfig: loadVenueConfig,
  getCredentials: () => getVenueCredentials(),
  getDefaultConfigPath: getConfigPath,
  buildClients: buildVenueClients,
  fetchCatalogs: fetchVenueCatalogs,
};

/**
 * Handler for the resolve command.
 */
export class ResolveHandler {
  constructor(
    private readonly deps: ResolveHandlerDeps = defaultDeps,
    private readonly resolver: AssetIdentityResolver = new AssetIdentityResolver()
  ) {}

  async execute(params: ResolveParams): Promise<Result<ResolveCommandResult, CliError>> {
    let credentials: Partial<Record<VenueId, ExchangeCredentials>>;
    let configPath: string;
    try {
      credentials = this.deps.getCredentials();
      configPath = params.configPath ?? this.deps.getDefaultConfigPath();
    } catch (error) {
      return err(new CliError(getErrorMessage(error), ExitCodes.CONFIG_ERROR));
    }

    const configResult = this.deps.loadConfig(configPath);
    if (configResult.isErr()) {
      return err(new CliError(configResult.error.message, ExitCodes.CONFIG_ERROR));
    }
    const config = configResult.value;

    const timeoutMs = params.timeoutMs ?? config.fetchTimeoutMs;
    const { clients, skipped } = this.deps.buildClients(config, credentials, { timeoutMs });
    if (clients.length === 0) {
      const reasons = skipped.map((entry) => `${entry.venue}: ${entry.reason}`).join('; ');
      return err(new CliError(`No venue can be queried (${reasons})`, ExitCodes.CONFIG_ERROR));
    }

    logger.info(`Fetching catalogs from ${clients.map((client) => client.venue).join(', ')}`);
    const { catalog, errors } = await this.deps.fetchCatalogs(clients, { timeoutMs });

    if (errors.length === clients.length) {
      const reasons = errors.map((entry) => `${entry.venue}: ${entry.message}`).join('; ');
      return err(new CliError(`Every venue catalog fetch failed (${reasons})`, ExitCodes.GENERAL_ERROR));
    }

    const resolution = this.resolver.resolve(params.symbol, catalog);

    return ok({
      resolution,
      matches: attachNetworkTerms(resolution.verifiedMatches, catalog),
      venues: clients.map((client) => client.venue),
      venueErrors: errors,
      skippedVenues: skipped,
    });
  }
}
