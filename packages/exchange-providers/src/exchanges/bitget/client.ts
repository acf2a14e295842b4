import { parseDecimal, wrapError, type ExchangeCredentials, type VenueCoinListing } from '@coinbridge/core';
import { getLogger } from '@coinbridge/logger';
import * as ccxt from 'ccxt';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import * as ExchangeUtils from '../../core/exchange-utils.js';
import { inferDenomination, resolveContractAddress } from '../../core/listing-utils.js';
import type { IVenueCatalogClient, VenueClientOptions } from '../../core/types.js';

import { BitgetCoinSchema, BitgetCredentialsSchema, type BitgetCoin, type BitgetCredentials } from './schemas.js';

export function toBitgetListing(coin: BitgetCoin): VenueCoinListing {
  const denomination = inferDenomination(coin.coinName);

  return {
    venue: 'bitget',
    symbol: coin.coinName,
    name: coin.coinName,
    denomination,
    networks: coin.chains.map((chain) => ({
      network: chain.chain,
      contractAddress: resolveContractAddress({
        symbol: coin.coinName,
        denomination,
        network: chain.chain,
        contractAddress: chain.contractAddress,
      }),
      depositEnabled: chain.rechargeable,
      withdrawalEnabled: chain.withdrawable,
      minWithdrawal: parseDecimal(chain.minWithdrawAmount),
      withdrawalFee: parseDecimal(chain.withdrawFee),
      explorerUrl: chain.browserUrl,
    })),
  };
}

function toCcxtOptions({
  apiKey,
  secret,
  passphrase,
}: BitgetCredentials): { apiKey?: string; secret?: string; password?: string } {
  // Bitget calls the passphrase "password" in ccxt
  return apiKey && secret && passphrase ? { apiKey, secret, password: passphrase } : {};
}

/**
 * Factory function that creates a Bitget catalog client.
 * Works without credentials; the coin list is a public endpoint.
 */
export function createBitgetCatalogClient(
  credentials: ExchangeCredentials = {},
  options: VenueClientOptions = {}
): Result<IVenueCatalogClient, Error> {
  const logger = getLogger('BitgetCatalogClient');

  return ExchangeUtils.validateCredentials(BitgetCredentialsSchema, credentials, 'bitget').map((validated) => {
    const exchange = new ccxt.bitget({ ...toCcxtOptions(validated), ...ExchangeUtils.toCcxtBaseOptions(options) });

    return {
      venue: 'bitget' as const,
      requiresAuth: false,

      async fetchCatalog(): Promise<Result<VenueCoinListing[], Error>> {
        try {
          const currencies = await exchange.fetchCurrencies();
          if (!currencies) {
            return err(new Error('bitget returned no currency data'));
          }

          const listings = ExchangeUtils.collectValidEntries(
            ExchangeUtils.extractCurrencyInfos(currencies),
            BitgetCoinSchema,
            'bitget',
            toBitgetListing,
            logger
          );

          logger.debug(`Fetched ${listings.length} bitget coins`);
          return ok(listings);
        } catch (error) {
          return wrapError(error, 'Failed to fetch bitget catalog');
        }
      },
    };
  });
}
