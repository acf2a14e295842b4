import { normalizeContractAddress, standardizeNetwork } from '@coinbridge/asset-identity';

const INSCRIPTION_NETWORK = 'BRC20';
const MILLION = 1_000_000;

// Longest prefix first; a letter must follow so "1000000" is not read as 1000
const TICKER_DENOMINATION_PREFIXES: readonly { pattern: RegExp; denomination: number }[] = [
  { pattern: /^1000000(?=[A-Z])/, denomination: MILLION },
  { pattern: /^1000(?=[A-Z])/, denomination: 1000 },
  { pattern: /^1M(?=[A-Z])/, denomination: MILLION },
];

/**
 * Denomination of a listed ticker: the venue's own figure when it reports one
 * above 1, otherwise read from a "1000"/"1000000"/"1M" ticker prefix.
 */
export function inferDenomination(symbol: string, reported?: number | null): number | undefined {
  if (reported !== null && reported !== undefined && Number.isInteger(reported) && reported > 1) {
    return reported;
  }

  const upper = symbol.toUpperCase();
  for (const { pattern, denomination } of TICKER_DENOMINATION_PREFIXES) {
    if (pattern.test(upper)) return denomination;
  }
  return undefined;
}

/**
 * "1000SATS" -> "SATS", "1MBABYDOGE" -> "BABYDOGE"; anything else unchanged.
 */
export function stripDenominationPrefix(symbol: string, denomination?: number): string {
  if (denomination === undefined || denomination <= 1) return symbol;

  const upper = symbol.toUpperCase();
  const numericPrefix = String(denomination);
  if (upper.startsWith(numericPrefix)) return symbol.slice(numericPrefix.length);
  if (denomination === MILLION && upper.startsWith('1M')) return symbol.slice(2);
  return symbol;
}

export interface ContractAddressInput {
  symbol: string;
  denomination?: number | undefined;
  network: string;
  chainType?: string | undefined;
  contractAddress?: string | undefined;
}

/**
 * Contract address to publish for a network listing.
 *
 * Blank and placeholder addresses become undefined. Inscription tokens have no
 * contract, so BRC-20 listings without one get the lower-cased base ticker as
 * a stand-in. Contract keys use the listing's network label, so the stand-in
 * only links venues whose labels standardize alike: "BRC20" and "ORDIBTC"
 * share a key, while a "BTC" label with chainType BRC20 keys under BTC.
 */
export function resolveContractAddress(input: ContractAddressInput): string | undefined {
  const address = input.contractAddress?.trim();
  if (address && normalizeContractAddress(address)) {
    return address;
  }

  if (isInscriptionNetwork(input.network, input.chainType)) {
    return stripDenominationPrefix(input.symbol, input.denomination).toLowerCase();
  }
  return undefined;
}

export function isInscriptionNetwork(network: string, chainType?: string): boolean {
  if (standardizeNetwork(network) === INSCRIPTION_NETWORK) return true;
  return chainType !== undefined && standardizeNetwork(chainType) === INSCRIPTION_NETWORK;
}
