/**
 * A canonical network code and every label venues use for it.
 */
export interface NetworkAliasGroup {
  readonly code: string;
  readonly aliases: readonly string[];
}

/**
 * Default alias table, checked in order; the first group containing a label
 * wins. "BTC" sits in both the native Bitcoin group and the BRC-20 group on
 * purpose, so a bare "BTC" label always resolves to the native chain.
 */
export const DEFAULT_NETWORK_ALIAS_GROUPS: readonly NetworkAliasGroup[] = [
  { code: 'BSC', aliases: ['BSC', 'BEP20', 'BNB Smart Chain', 'BNB Smart Chain (BEP20)', 'BEP-20'] },
  { code: 'ETH', aliases: ['ETH', 'ERC20', 'Ethereum', 'Ethereum (ERC20)', 'ERC-20'] },
  { code: 'TRX', aliases: ['TRX', 'TRC20', 'Tron', 'Tron (TRC20)', 'TRC-20'] },
  { code: 'ARBITRUM', aliases: ['ARBITRUM', 'ArbitrumOne', 'Arbitrum One', 'ARBI', 'ARB'] },
  { code: 'POLYGON', aliases: ['MATIC', 'Polygon', 'Polygon PoS', 'Polygon POS', 'POLYGON'] },
  { code: 'OPTIMISM', aliases: ['OPTIMISM', 'Optimism', 'OP', 'OP Mainnet'] },
  { code: 'AVAX', aliases: ['AVAXC', 'AVAX C-Chain', 'CAVAX', 'Avalanche C-Chain', 'AVAX-C'] },
  { code: 'SOL', aliases: ['SOL', 'Solana'] },
  { code: 'BTC', aliases: ['BTC', 'Bitcoin'] },
  { code: 'XRP', aliases: ['XRP', 'XRP Ledger'] },
  { code: 'TON', aliases: ['TON', 'The Open Network'] },
  { code: 'APTOS', aliases: ['APT', 'Aptos'] },
  { code: 'BRC20', aliases: ['BRC20', 'ORDIBTC', 'ORDI-BRC20', 'BTC'] },
];
