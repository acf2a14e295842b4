import { parseDecimal, wrapError, type ExchangeCredentials, type VenueCoinListing } from '@coinbridge/core';
import { getLogger } from '@coinbridge/logger';
import * as ccxt from 'ccxt';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import * as ExchangeUtils from '../../core/exchange-utils.js';
import { inferDenomination, resolveContractAddress } from '../../core/listing-utils.js';
import type { IVenueCatalogClient, VenueClientOptions } from '../../core/types.js';

import { BybitCoinSchema, BybitCredentialsSchema, type BybitCoin } from './schemas.js';

// Fee reported for chains that do not support withdrawals
const WITHDRAWAL_UNSUPPORTED_FEE = -1;

export function toBybitListing(coin: BybitCoin): VenueCoinListing {
  const denomination = inferDenomination(coin.coin);

  return {
    venue: 'bybit',
    symbol: coin.coin,
    name: coin.name || coin.coin,
    denomination,
    networks: coin.chains.map((chain) => {
      const withdrawable = chain.withdrawFee !== '';

      return {
        network: chain.chain,
        contractAddress: resolveContractAddress({
          symbol: coin.coin,
          denomination,
          network: chain.chain,
          chainType: chain.chainType,
          contractAddress: chain.contractAddress,
        }),
        depositEnabled: chain.chainDeposit,
        withdrawalEnabled: withdrawable && chain.chainWithdraw,
        minWithdrawal: parseDecimal(chain.withdrawMin),
        withdrawalFee: withdrawable ? parseDecimal(chain.withdrawFee) : parseDecimal(WITHDRAWAL_UNSUPPORTED_FEE),
        chainType: chain.chainType,
      };
    }),
  };
}

/**
 * Factory function that creates a Bybit catalog client
 */
export function createBybitCatalogClient(
  credentials: ExchangeCredentials = {},
  options: VenueClientOptions = {}
): Result<IVenueCatalogClient, Error> {
  const logger = getLogger('BybitCatalogClient');

  return ExchangeUtils.validateCredentials(BybitCredentialsSchema, credentials, 'bybit').map(({ apiKey, secret }) => {
    const exchange = new ccxt.bybit({ apiKey, secret, ...ExchangeUtils.toCcxtBaseOptions(options) });

    return {
      venue: 'bybit' as const,
      requiresAuth: true,

      async fetchCatalog(): Promise<Result<VenueCoinListing[], Error>> {
        try {
          const currencies = await exchange.fetchCurrencies();
          if (!currencies) {
            return err(new Error('bybit returned no currency data'));
          }

          const listings = ExchangeUtils.collectValidEntries(
            ExchangeUtils.extractCurrencyInfos(currencies),
            BybitCoinSchema,
            'bybit',
            toBybitListing,
            logger
          );

          logger.debug(`Fetched ${listings.length} bybit coins`);
          return ok(listings);
        } catch (error) {
          return wrapError(error, 'Failed to fetch bybit catalog');
        }
      },
    };
  });
}
