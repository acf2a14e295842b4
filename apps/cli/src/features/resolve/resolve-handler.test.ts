import { parseDecimal, ResolutionResultSchema, type VenueCoinListing, type VenueId } from '@coinbridge/core';
import type { IVenueCatalogClient, VenueConfig } from '@coinbridge/exchange-providers';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { ExitCodes } from '../shared/exit-codes.js';

import { ResolveHandler, type ResolveHandlerDeps } from './resolve-handler.js';

function listing(venue: VenueId, symbol: string, network: string, contractAddress: string): VenueCoinListing {
  return {
    venue,
    symbol,
    name: symbol,
    networks: [
      {
        network,
        contractAddress,
        depositEnabled: true,
        withdrawalEnabled: true,
        minWithdrawal: parseDecimal('1'),
        withdrawalFee: parseDecimal('0.5'),
      },
    ],
  };
}

function client(venue: VenueId): IVenueCatalogClient {
  return { venue, requiresAuth: false, fetchCatalog: () => Promise.resolve(ok([])) };
}

const config: VenueConfig = { enabledVenues: ['bybit', 'binance'], fetchTimeoutMs: 30_000 };

function createDeps(overrides: Partial<ResolveHandlerDeps> = {}): ResolveHandlerDeps {
  return {
    loadConfig: vi.fn(() => ok(config)),
    getCredentials: () => ({}),
    getDefaultConfigPath: () => '/tmp/coinbridge.config.json',
    buildClients: vi.fn(() => ({ clients: [client('bybit'), client('binance')], skipped: [] })),
    fetchCatalogs: vi.fn(() =>
      Promise.resolve({
        catalog: {
          bybit: [listing('bybit', 'CAT', 'BSC', '0xabcd')],
          binance: [listing('binance', '1000CAT', 'BNB Smart Chain (BEP20)', '0xABCD')],
        },
        errors: [],
      })
    ),
    ...overrides,
  };
}

describe('ResolveHandler', () => {
  it('resolves the symbol against the fetched catalogs', async () => {
    const deps = createDeps();

    const result = await new ResolveHandler(deps).execute({ symbol: 'CAT' });
    const value = result._unsafeUnwrap();

    expect(value.venues).toEqual(['bybit', 'binance']);
    expect(value.resolution.verifiedMatches.map((match) => `${match.source}:${match.venue}:${match.symbol}`)).toEqual([
      'traditional:bybit:CAT',
      'smart:binance:1000CAT',
    ]);
    expect(deps.loadConfig).toHaveBeenCalledWith('/tmp/coinbridge.config.json');
    expect(deps.fetchCatalogs).toHaveBeenCalledWith(expect.any(Array), { timeoutMs: 30_000 });
  });

  it('attaches the transfer terms of each matched network', async () => {
    const value = (await new ResolveHandler(createDeps()).execute({ symbol: 'CAT' }))._unsafeUnwrap();

    expect(value.matches.map((match) => [match.venue, match.network, match.terms])).toEqual([
      ['bybit', 'BSC', { minWithdrawal: '1', withdrawalFee: '0.5', depositEnabled: true, withdrawalEnabled: true }],
      [
        'binance',
        'BNB Smart Chain (BEP20)',
        { minWithdrawal: '1', withdrawalFee: '0.5', depositEnabled: true, withdrawalEnabled: true },
      ],
    ]);
  });

  it('produces a resolution that survives a JSON round trip through its schema', async () => {
    const value = (await new ResolveHandler(createDeps()).execute({ symbol: 'CAT' }))._unsafeUnwrap();

    const parsed = ResolutionResultSchema.safeParse(JSON.parse(JSON.stringify(value.resolution)));

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data.verifiedMatches).toHaveLength(2);
      expect(parsed.data.possibleMatches).toEqual([]);
    }
  });

  it('prefers the explicit config path and timeout', async () => {
    const deps = createDeps();

    await new ResolveHandler(deps).execute({ symbol: 'CAT', configPath: 'custom.json', timeoutMs: 500 });

    expect(deps.loadConfig).toHaveBeenCalledWith('custom.json');
    expect(deps.buildClients).toHaveBeenCalledWith(config, {}, { timeoutMs: 500 });
    expect(deps.fetchCatalogs).toHaveBeenCalledWith(expect.any(Array), { timeoutMs: 500 });
  });

  it('maps config failures to the config exit code', async () => {
    const deps = createDeps({ loadConfig: () => err(new Error('Invalid venue configuration')) });

    const error = (await new ResolveHandler(deps).execute({ symbol: 'CAT' }))._unsafeUnwrapErr();

    expect(error.exitCode).toBe(ExitCodes.CONFIG_ERROR);
    expect(error.message).toBe('Invalid venue configuration');
  });

  it('maps environment failures to the config exit code', async () => {
    const deps = createDeps({
      getCredentials: () => {
        throw new Error('Environment validation failed');
      },
    });

    const error = (await new ResolveHandler(deps).execute({ symbol: 'CAT' }))._unsafeUnwrapErr();

    expect(error.exitCode).toBe(ExitCodes.CONFIG_ERROR);
  });

  it('fails when no venue can be queried', async () => {
    const deps = createDeps({
      buildClients: () => ({
        clients: [],
        skipped: [{ venue: 'binance', reason: 'no API credentials configured' }],
      }),
    });

    const error = (await new ResolveHandler(deps).execute({ symbol: 'CAT' }))._unsafeUnwrapErr();

    expect(error.exitCode).toBe(ExitCodes.CONFIG_ERROR);
    expect(error.message).toBe('No venue can be queried (binance: no API credentials configured)');
  });

  it('fails when every venue fetch fails', async () => {
    const deps = createDeps({
      fetchCatalogs: () =>
        Promise.resolve({
          catalog: { bybit: [], binance: [] },
          errors: [
            { venue: 'bybit', message: 'down' },
            { venue: 'binance', message: 'timed out' },
          ],
        }),
    });

    const error = (await new ResolveHandler(deps).execute({ symbol: 'CAT' }))._unsafeUnwrapErr();

    expect(error.exitCode).toBe(ExitCodes.GENERAL_ERROR);
    expect(error.message).toBe('Every venue catalog fetch failed (bybit: down; binance: timed out)');
  });

  it('keeps partial results when some venues fail', async () => {
    const deps = createDeps({
      fetchCatalogs: () =>
        Promise.resolve({
          catalog: { bybit: [listing('bybit', 'CAT', 'BSC', '0xabcd')], binance: [] },
          errors: [{ venue: 'binance', message: 'timed out' }],
        }),
    });

    const value = (await new ResolveHandler(deps).execute({ symbol: 'CAT' }))._unsafeUnwrap();

    expect(value.resolution.verifiedMatches).toHaveLength(1);
    expect(value.venueErrors).toEqual([{ venue: 'binance', message: 'timed out' }]);
  });
});
