import type { NetworkNameStandardizer } from '@coinbridge/asset-identity';

export interface StandardizedLabel {
  label: string;
  code: string;
  /** Whether `code` is one of the alias table's canonical codes */
  known: boolean;
}

export function standardizeLabels(labels: readonly string[], standardizer: NetworkNameStandardizer): StandardizedLabel[] {
  const canonical = new Set(standardizer.canonicalCodes());

  return labels.map((label) => {
    const code = standardizer.standardize(label);
    return { label, code, known: canonical.has(code) };
  });
}

export function formatStandardizedLabels(entries: readonly StandardizedLabel[]): string[] {
  const width = Math.max(0, ...entries.map((entry) => entry.label.length));

  return entries.map((entry) => {
    const suffix = entry.known ? '' : ' (unrecognized)';
    return `${entry.label.padEnd(width)}  ->  ${entry.code || '(empty)'}${suffix}`;
  });
}
