import type { VenueCatalog } from '@coinbridge/core';
import { describe, expect, it } from 'vitest';

import { coin, network } from '../../__tests__/catalog-fixtures.js';
import { defaultNetworkStandardizer } from '../../network/network-standardizer.js';
import { ContractIdentityIndex } from '../contract-identity-index.js';
import { matchByContractClosure } from '../contract-closure-matcher.js';
import { matchTraditional } from '../traditional-matcher.js';

function runClosure(query: string, catalog: VenueCatalog) {
  const traditional = matchTraditional(query, catalog);
  const index = ContractIdentityIndex.build(catalog);
  return matchByContractClosure(query, catalog, index, defaultNetworkStandardizer, traditional);
}

describe('matchByContractClosure', () => {
  it('finds a differently named listing through a shared contract', () => {
    const catalog = {
      bybit: [coin('bybit', 'CAT', [network('BSC', '0xABCD')])],
      binance: [coin('binance', '1000CAT', [network('BNB Smart Chain (BEP20)', '0xabcd')])],
    };

    const { matches, trace } = runClosure('CAT', catalog);

    expect(matches).toEqual([
      {
        venue: 'binance',
        symbol: '1000CAT',
        network: 'BNB Smart Chain (BEP20)',
        contractAddress: '0xabcd',
        verified: true,
        source: 'smart',
      },
    ]);
    expect([...trace.seedContracts]).toEqual(['0xabcd_BSC']);
    expect([...trace.relatedSymbols]).toEqual(['CAT', '1000CAT']);
  });

  it("pulls in a related symbol's other networks", () => {
    const catalog = {
      bybit: [coin('bybit', 'CAT', [network('BSC', '0xabcd')])],
      binance: [coin('binance', '1000CAT', [network('BEP20', '0xabcd'), network('ERC20', '0x1111')])],
      bitget: [coin('bitget', 'KITTY', [network('Ethereum', '0x1111')])],
    };

    const { matches, trace } = runClosure('CAT', catalog);

    expect(matches.map((match) => [match.venue, match.symbol, match.network])).toEqual([
      ['binance', '1000CAT', 'BEP20'],
      ['binance', '1000CAT', 'ERC20'],
      ['bitget', 'KITTY', 'Ethereum'],
    ]);
    expect([...trace.expandedContracts]).toEqual(['0xabcd_BSC', '0x1111_ETH']);
  });

  it('stops after the second hop', () => {
    const catalog = {
      bybit: [coin('bybit', 'CAT', [network('BSC', '0xabcd')])],
      binance: [coin('binance', '1000CAT', [network('BEP20', '0xabcd'), network('ERC20', '0x1111')])],
      bitget: [
        coin('bitget', 'KITTY', [network('Ethereum', '0x1111'), network('SOL', 'kittymint')]),
        coin('bitget', 'KITTEN', [network('Solana', 'kittymint')]),
      ],
    };

    const { matches, trace } = runClosure('CAT', catalog);
    const symbols = matches.map((match) => match.symbol);

    expect([...trace.relatedSymbols]).toEqual(['CAT', '1000CAT']);
    expect(symbols).toContain('KITTY');
    expect(symbols).not.toContain('KITTEN');
    // KITTY's Solana listing is only reachable through a third hop
    expect(matches.some((match) => match.symbol === 'KITTY' && match.network === 'SOL')).toBe(false);
  });

  it('never re-emits listings of coins that match the query by symbol', () => {
    const catalog = {
      binance: [
        coin('binance', 'CAT', [network('BSC', '0xabcd')]),
        coin('binance', 'cat', [network('ERC20', '0x2222')]),
      ],
      bybit: [coin('bybit', 'KITTY', [network('BEP20', '0xabcd')])],
    };

    const { matches } = runClosure('CAT', catalog);

    expect(matches.map((match) => [match.venue, match.symbol, match.network])).toEqual([['bybit', 'KITTY', 'BEP20']]);
  });

  it('emits nothing when no listing carries a contract', () => {
    const catalog = {
      binance: [coin('binance', 'BTC', [network('BTC')])],
      bybit: [coin('bybit', 'BTC', [network('Bitcoin', 'null')])],
    };

    const { matches, trace } = runClosure('BTC', catalog);

    expect(matches).toEqual([]);
    expect(trace.seedContracts.size).toBe(0);
  });

  it('treats contracts on different canonical networks as different identities', () => {
    const catalog = {
      bybit: [coin('bybit', 'CAT', [network('BSC', '0xabcd')])],
      binance: [coin('binance', 'KITTY', [network('ERC20', '0xabcd')])],
    };

    expect(runClosure('CAT', catalog).matches).toEqual([]);
  });
});
