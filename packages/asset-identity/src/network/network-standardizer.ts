import { DEFAULT_NETWORK_ALIAS_GROUPS, type NetworkAliasGroup } from './network-aliases.js';

interface IndexedGroup {
  readonly group: NetworkAliasGroup;
  readonly upperAliases: ReadonlySet<string>;
}

const PARENTHESIZED_SEGMENT = /\([^)]*\)/g;

/**
 * Strip parenthesized segments, trim, upper-case.
 * "BNB Smart Chain (BEP20)" -> "BNB SMART CHAIN"
 */
export function cleanNetworkLabel(label: string): string {
  return label.replace(PARENTHESIZED_SEGMENT, '').trim().toUpperCase();
}

/**
 * Canonicalizes free-text venue network labels into a small set of codes.
 *
 * Instances are immutable once constructed. Labels that match no group come
 * back cleaned but otherwise untouched, so unknown networks stay distinct
 * instead of collapsing into each other.
 */
export class NetworkNameStandardizer {
  private readonly groups: readonly IndexedGroup[];

  constructor(groups: readonly NetworkAliasGroup[] = DEFAULT_NETWORK_ALIAS_GROUPS) {
    this.groups = Object.freeze(
      groups.map((group) => ({
        group: Object.freeze({ code: group.code, aliases: Object.freeze([...group.aliases]) }),
        upperAliases: new Set(group.aliases.map((alias) => alias.toUpperCase())),
      }))
    );
  }

  standardize(label: string): string {
    if (!label) return '';

    const cleaned = cleanNetworkLabel(label);
    for (const { group, upperAliases } of this.groups) {
      if (upperAliases.has(cleaned)) {
        return group.code;
      }
    }
    return cleaned;
  }

  /**
   * All labels of a canonical code, or the code itself when it has no group.
   */
  aliasesFor(code: string): readonly string[] {
    const upper = code.toUpperCase();
    const match = this.groups.find(({ group }) => group.code.toUpperCase() === upper);
    return match ? match.group.aliases : [code];
  }

  canonicalCodes(): string[] {
    return this.groups.map(({ group }) => group.code);
  }
}

export const defaultNetworkStandardizer = new NetworkNameStandardizer();

export function standardizeNetwork(label: string): string {
  return defaultNetworkStandardizer.standardize(label);
}
