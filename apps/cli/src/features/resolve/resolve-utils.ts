import {
  catalogEntries,
  type MatchRecord,
  type VenueCatalogInput,
  type VenueNetworkListing,
} from '@coinbridge/core';

import type { ResolveCommandResult } from './resolve-handler.js';

const TABLE_HEADERS = ['Venue', 'Symbol', 'Network', 'Contract', 'Min withdrawal', 'Fee', 'Status'] as const;
const COLUMN_GAP = '  ';

/**
 * Transfer terms of the network a match was found on. Amounts are plain
 * decimal strings; a fee of "-1" means the venue does not support withdrawals.
 */
export interface NetworkTerms {
  minWithdrawal: string;
  withdrawalFee: string;
  depositEnabled: boolean;
  withdrawalEnabled: boolean;
}

export type ResolvedMatch = MatchRecord & { terms?: NetworkTerms | undefined };

export interface MatchesBySource<T extends MatchRecord = ResolvedMatch> {
  traditional: T[];
  smart: T[];
}

export function groupMatchesBySource<T extends MatchRecord>(matches: readonly T[]): MatchesBySource<T> {
  return {
    traditional: matches.filter((match) => match.source === 'traditional'),
    smart: matches.filter((match) => match.source === 'smart'),
  };
}

function termsKey(venue: string, symbol: string, network: string): string {
  return `${venue}\u0000${symbol}\u0000${network}`;
}

function toNetworkTerms(listing: VenueNetworkListing): NetworkTerms {
  return {
    minWithdrawal: listing.minWithdrawal.toFixed(),
    withdrawalFee: listing.withdrawalFee.toFixed(),
    depositEnabled: listing.depositEnabled,
    withdrawalEnabled: listing.withdrawalEnabled,
  };
}

/**
 * Attach the catalog's transfer terms to each match, looked up by
 * (venue, symbol, network). The first listing of a triple wins.
 */
export function attachNetworkTerms(matches: readonly MatchRecord[], catalog: VenueCatalogInput): ResolvedMatch[] {
  const terms = new Map<string, NetworkTerms>();
  for (const [venue, coins] of catalogEntries(catalog)) {
    for (const coin of coins) {
      for (const listing of coin.networks) {
        const key = termsKey(venue, coin.symbol, listing.network);
        if (!terms.has(key)) {
          terms.set(key, toNetworkTerms(listing));
        }
      }
    }
  }

  return matches.map((match) => ({ ...match, terms: terms.get(termsKey(match.venue, match.symbol, match.network)) }));
}

export function formatTransferStatus(terms: NetworkTerms): string {
  if (terms.depositEnabled && terms.withdrawalEnabled) return 'open';
  if (terms.depositEnabled) return 'deposit only';
  if (terms.withdrawalEnabled) return 'withdraw only';
  return 'suspended';
}

/**
 * Left-aligned plain-text table, header first. Missing contracts and terms
 * show as "-", as does the fee of a network without withdrawals.
 */
export function formatMatchTable(matches: readonly ResolvedMatch[]): string[] {
  const rows = matches.map(({ venue, symbol, network, contractAddress, terms }) => [
    venue,
    symbol,
    network,
    contractAddress || '-',
    terms?.minWithdrawal ?? '-',
    terms && !terms.withdrawalFee.startsWith('-') ? terms.withdrawalFee : '-',
    terms ? formatTransferStatus(terms) : '-',
  ]);
  const widths = TABLE_HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => row[column]?.length ?? 0))
  );

  return [[...TABLE_HEADERS], ...rows].map((cells) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join(COLUMN_GAP)
      .trimEnd()
  );
}

/**
 * Human-readable report for the resolve command.
 */
export function formatResolveReport(result: ResolveCommandResult): string[] {
  const { resolution, matches, venues, venueErrors, skippedVenues } = result;
  const { traditional, smart } = groupMatchesBySource(matches);
  const lines: string[] = [`Results for ${resolution.originalSymbol} across ${venues.join(', ')}`, ''];

  if (matches.length === 0) {
    lines.push('No listings found.');
  }

  if (traditional.length > 0) {
    lines.push(`Symbol matches (${traditional.length}):`, ...formatMatchTable(traditional).map(indent), '');
  }

  if (smart.length > 0) {
    lines.push(`Contract matches (${smart.length}):`, ...formatMatchTable(smart).map(indent), '');
  }

  if (venueErrors.length > 0) {
    lines.push('Venue errors:', ...venueErrors.map((entry) => indent(`${entry.venue}: ${entry.message}`)));
  }

  if (skippedVenues.length > 0) {
    lines.push('Skipped venues:', ...skippedVenues.map((entry) => indent(`${entry.venue}: ${entry.reason}`)));
  }

  return trimTrailingBlank(lines);
}

function indent(line: string): string {
  return `  ${line}`;
}

function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1] === '') end--;
  return lines.slice(0, end);
}
