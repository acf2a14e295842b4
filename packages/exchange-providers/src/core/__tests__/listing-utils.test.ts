import { describe, expect, it } from 'vitest';

import {
  inferDenomination,
  isInscriptionNetwork,
  resolveContractAddress,
  stripDenominationPrefix,
} from '../listing-utils.js';

describe('inferDenomination', () => {
  it('prefers a reported denomination above 1', () => {
    expect(inferDenomination('SATS', 1000)).toBe(1000);
  });

  it('ignores reported values of 1 or less', () => {
    expect(inferDenomination('BTC', 1)).toBeUndefined();
    expect(inferDenomination('BTC', 0)).toBeUndefined();
  });

  it.each([
    ['1000SATS', 1000],
    ['1000000MOG', 1_000_000],
    ['1MBABYDOGE', 1_000_000],
    ['1000cat', 1000],
  ])('reads %s as denomination %d', (symbol, denomination) => {
    expect(inferDenomination(symbol)).toBe(denomination);
  });

  it.each(['1INCH', '10000LADYS', 'SATS', '1000', '1M'])('finds no denomination in %s', (symbol) => {
    expect(inferDenomination(symbol)).toBeUndefined();
  });
});

describe('stripDenominationPrefix', () => {
  it('removes numeric and shorthand prefixes', () => {
    expect(stripDenominationPrefix('1000SATS', 1000)).toBe('SATS');
    expect(stripDenominationPrefix('1MBABYDOGE', 1_000_000)).toBe('BABYDOGE');
    expect(stripDenominationPrefix('1000000MOG', 1_000_000)).toBe('MOG');
  });

  it('leaves symbols alone without a denomination', () => {
    expect(stripDenominationPrefix('1000SATS')).toBe('1000SATS');
    expect(stripDenominationPrefix('SATS', 1000)).toBe('SATS');
  });
});

describe('isInscriptionNetwork', () => {
  it('detects BRC-20 by network label or chain type', () => {
    expect(isInscriptionNetwork('BRC20')).toBe(true);
    expect(isInscriptionNetwork('ORDIBTC')).toBe(true);
    expect(isInscriptionNetwork('BTC', 'BRC20')).toBe(true);
    expect(isInscriptionNetwork('BTC')).toBe(false);
    expect(isInscriptionNetwork('BTC', 'Bitcoin')).toBe(false);
  });
});

describe('resolveContractAddress', () => {
  it('keeps a real address trimmed', () => {
    expect(resolveContractAddress({ symbol: 'CAT', network: 'BSC', contractAddress: ' 0xABC ' })).toBe('0xABC');
  });

  it('drops placeholder addresses', () => {
    expect(resolveContractAddress({ symbol: 'CAT', network: 'BSC', contractAddress: 'null' })).toBeUndefined();
    expect(resolveContractAddress({ symbol: 'CAT', network: 'BSC', contractAddress: '' })).toBeUndefined();
  });

  it('uses the base ticker for inscriptions without an address', () => {
    expect(resolveContractAddress({ symbol: '1000SATS', denomination: 1000, network: 'BRC20' })).toBe('sats');
    expect(resolveContractAddress({ symbol: 'ORDI', network: 'BTC', chainType: 'BRC20', contractAddress: 'none' })).toBe(
      'ordi'
    );
  });

  it('gives native coins no address', () => {
    expect(resolveContractAddress({ symbol: 'BTC', network: 'BTC' })).toBeUndefined();
  });
});
