import { z } from 'zod';

import { AmountTextSchema, OptionalTextSchema, VenueFlagSchema } from '../../core/schemas.js';

const OptionalKeySchema = z.string().trim().min(1).optional();

/**
 * Bitget's coin list is public. Keys are optional but go together.
 */
export const BitgetCredentialsSchema = z
  .object({
    apiKey: OptionalKeySchema,
    secret: OptionalKeySchema,
    passphrase: OptionalKeySchema,
  })
  .refine(
    ({ apiKey, secret, passphrase }) =>
      (apiKey === undefined && secret === undefined && passphrase === undefined) ||
      (apiKey !== undefined && secret !== undefined && passphrase !== undefined),
    { message: 'apiKey, secret and passphrase must be provided together' }
  );

export type BitgetCredentials = z.infer<typeof BitgetCredentialsSchema>;

/**
 * One entry of `chains` in Bitget's public coin list (via ccxt fetchCurrencies)
 */
export const BitgetChainSchema = z.object({
  chain: z.string(),
  minWithdrawAmount: AmountTextSchema,
  withdrawFee: AmountTextSchema,
  rechargeable: VenueFlagSchema,
  withdrawable: VenueFlagSchema,
  contractAddress: OptionalTextSchema,
  browserUrl: OptionalTextSchema,
});

export const BitgetCoinSchema = z.object({
  coinName: z.string().trim().min(1),
  chains: z.array(BitgetChainSchema),
});

export type BitgetChain = z.infer<typeof BitgetChainSchema>;
export type BitgetCoin = z.infer<typeof BitgetCoinSchema>;
