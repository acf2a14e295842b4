import type { NetworkNameStandardizer } from '../network/network-standardizer.js';

const PLACEHOLDER_ADDRESSES: ReadonlySet<string> = new Set(['', 'null', 'none']);

/**
 * Lower-cased, trimmed contract address, or undefined for blank and
 * placeholder values venues send when a coin has no contract.
 */
export function normalizeContractAddress(address: string | null | undefined): string | undefined {
  if (address === null || address === undefined) return undefined;

  const normalized = address.trim().toLowerCase();
  return PLACEHOLDER_ADDRESSES.has(normalized) ? undefined : normalized;
}

/**
 * `<lowercase address>_<canonical network>`. Two listings sharing a key are the
 * same asset on the same chain, whatever their symbol or venue.
 */
export function buildContractKey(
  address: string | null | undefined,
  networkLabel: string,
  standardizer: NetworkNameStandardizer
): string | undefined {
  const normalized = normalizeContractAddress(address);
  if (!normalized) return undefined;

  return `${normalized}_${standardizer.standardize(networkLabel)}`;
}
