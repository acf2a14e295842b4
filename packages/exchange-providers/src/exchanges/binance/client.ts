import { parseDecimal, wrapError, type ExchangeCredentials, type VenueCoinListing } from '@coinbridge/core';
import { getLogger } from '@coinbridge/logger';
import * as ccxt from 'ccxt';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import * as ExchangeUtils from '../../core/exchange-utils.js';
import { inferDenomination, resolveContractAddress } from '../../core/listing-utils.js';
import type { IVenueCatalogClient, VenueClientOptions } from '../../core/types.js';

import { BinanceCoinSchema, BinanceCredentialsSchema, type BinanceCoin } from './schemas.js';

/**
 * Map a validated Binance coin to the common listing shape.
 * Binance reports re-denominated tokens ("1000SATS") with a per-network
 * `denomination`; the first one above 1 applies to the coin.
 */
export function toBinanceListing(coin: BinanceCoin): VenueCoinListing {
  const reported = coin.networkList.find((network) => network.denomination !== undefined && network.denomination > 1);
  const denomination = inferDenomination(coin.coin, reported?.denomination);

  return {
    venue: 'binance',
    symbol: coin.coin,
    name: coin.name || coin.coin,
    denomination,
    networks: coin.networkList.map((network) => ({
      network: network.network,
      contractAddress: resolveContractAddress({
        symbol: coin.coin,
        denomination,
        network: network.network,
        chainType: network.name,
        contractAddress: network.contractAddress,
      }),
      depositEnabled: network.depositEnable,
      withdrawalEnabled: network.withdrawEnable,
      minWithdrawal: parseDecimal(network.withdrawMin),
      withdrawalFee: parseDecimal(network.withdrawFee),
      chainType: network.name,
      explorerUrl: network.contractAddressUrl,
    })),
  };
}

/**
 * Factory function that creates a Binance catalog client.
 * Binance only exposes per-network terms on an authenticated endpoint.
 */
export function createBinanceCatalogClient(
  credentials: ExchangeCredentials = {},
  options: VenueClientOptions = {}
): Result<IVenueCatalogClient, Error> {
  const logger = getLogger('BinanceCatalogClient');

  return ExchangeUtils.validateCredentials(BinanceCredentialsSchema, credentials, 'binance').map(
    ({ apiKey, secret }) => {
      const exchange = new ccxt.binance({ apiKey, secret, ...ExchangeUtils.toCcxtBaseOptions(options) });

      return {
        venue: 'binance' as const,
        requiresAuth: true,

        async fetchCatalog(): Promise<Result<VenueCoinListing[], Error>> {
          try {
            const currencies = await exchange.fetchCurrencies();
            if (!currencies) {
              return err(new Error('binance returned no currency data'));
            }

            const listings = ExchangeUtils.collectValidEntries(
              ExchangeUtils.extractCurrencyInfos(currencies),
              BinanceCoinSchema,
              'binance',
              toBinanceListing,
              logger
            );

            logger.debug(`Fetched ${listings.length} binance coins`);
            return ok(listings);
          } catch (error) {
            return wrapError(error, 'Failed to fetch binance catalog');
          }
        },
      };
    }
  );
}
