import { NetworkNameStandardizer } from '@coinbridge/asset-identity';
import { describe, expect, it } from 'vitest';

import { formatStandardizedLabels, standardizeLabels } from './networks-utils.js';

describe('networks-utils', () => {
  const standardizer = new NetworkNameStandardizer();

  describe('standardizeLabels', () => {
    it('maps each label and flags unknown networks', () => {
      expect(standardizeLabels(['BNB Smart Chain (BEP20)', 'kaspa', 'ORDI-BRC20'], standardizer)).toEqual([
        { label: 'BNB Smart Chain (BEP20)', code: 'BSC', known: true },
        { label: 'kaspa', code: 'KASPA', known: false },
        { label: 'ORDI-BRC20', code: 'BRC20', known: true },
      ]);
    });
  });

  describe('formatStandardizedLabels', () => {
    it('aligns labels and marks unrecognized codes', () => {
      expect(
        formatStandardizedLabels([
          { label: 'Ethereum', code: 'ETH', known: true },
          { label: 'kaspa', code: 'KASPA', known: false },
          { label: '()', code: '', known: false },
        ])
      ).toEqual(['Ethereum  ->  ETH', 'kaspa     ->  KASPA (unrecognized)', '()        ->  (empty) (unrecognized)']);
    });
  });
});
