import { z } from 'zod';

import { AmountTextSchema, OptionalTextSchema, VenueFlagSchema } from '../../core/schemas.js';

export const BybitCredentialsSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  secret: z.string().min(1, 'secret is required'),
});

export type BybitCredentials = z.infer<typeof BybitCredentialsSchema>;

/**
 * One entry of `chains` in Bybit's coin info (via ccxt fetchCurrencies)
 */
export const BybitChainSchema = z.object({
  chain: z.string(),
  chainType: OptionalTextSchema, // "BNB Smart Chain", "BRC20"
  withdrawMin: AmountTextSchema,
  withdrawFee: AmountTextSchema, // "" when the chain has no withdrawals
  chainDeposit: VenueFlagSchema,
  chainWithdraw: VenueFlagSchema,
  contractAddress: OptionalTextSchema,
});

export const BybitCoinSchema = z.object({
  coin: z.string().trim().min(1),
  name: z.string().default(''),
  chains: z.array(BybitChainSchema),
});

export type BybitChain = z.infer<typeof BybitChainSchema>;
export type BybitCoin = z.infer<typeof BybitCoinSchema>;
