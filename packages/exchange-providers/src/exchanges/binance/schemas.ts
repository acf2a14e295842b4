import { z } from 'zod';

import { AmountTextSchema, OptionalTextSchema, VenueFlagSchema } from '../../core/schemas.js';

export const BinanceCredentialsSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  secret: z.string().min(1, 'secret is required'),
});

export type BinanceCredentials = z.infer<typeof BinanceCredentialsSchema>;

/**
 * One entry of `networkList` in Binance's capital config (via ccxt fetchCurrencies)
 */
export const BinanceNetworkSchema = z.object({
  network: z.string(),
  name: OptionalTextSchema, // "BNB Smart Chain (BEP20)"
  withdrawMin: AmountTextSchema,
  withdrawFee: AmountTextSchema,
  depositEnable: VenueFlagSchema,
  withdrawEnable: VenueFlagSchema,
  contractAddress: OptionalTextSchema,
  contractAddressUrl: OptionalTextSchema,
  denomination: z.number().optional(), // only set on re-denominated tokens
});

export const BinanceCoinSchema = z.object({
  coin: z.string().trim().min(1),
  name: z.string().default(''),
  networkList: z.array(BinanceNetworkSchema),
});

export type BinanceNetwork = z.infer<typeof BinanceNetworkSchema>;
export type BinanceCoin = z.infer<typeof BinanceCoinSchema>;
