const MILLION = 1_000_000;
const MILLION_SHORTHAND = '1M';

/**
 * Whether a venue's listed ticker denotes the queried base asset.
 *
 * Venues price some small-unit tokens per thousand or per million units and
 * prefix the ticker accordingly ("1000SATS", "1MBABYDOGE"). The prefix is only
 * stripped when the listing reports a matching denomination, so tickers that
 * merely start with digits never match.
 */
export function matchesDenomination(
  listedSymbol: string,
  denomination: number | null | undefined,
  querySymbol: string
): boolean {
  const listed = listedSymbol.toUpperCase();
  const query = querySymbol.toUpperCase();

  if (listed === query) {
    return true;
  }

  if (denomination === null || denomination === undefined || denomination <= 1) {
    return false;
  }

  const numericPrefix = String(denomination);
  if (listed.startsWith(numericPrefix)) {
    return listed.slice(numericPrefix.length) === query;
  }

  if (denomination === MILLION && listed.startsWith(MILLION_SHORTHAND)) {
    return listed.slice(MILLION_SHORTHAND.length) === query;
  }

  return false;
}
