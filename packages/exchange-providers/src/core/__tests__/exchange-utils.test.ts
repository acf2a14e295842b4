import type { Logger } from '@coinbridge/logger';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import {
  collectValidEntries,
  extractCurrencyInfos,
  toCcxtBaseOptions,
  validateCredentials,
  validateRawData,
} from '../exchange-utils.js';

describe('validateCredentials', () => {
  const TestCredentialsSchema = z.object({
    apiKey: z.string().min(1),
    secret: z.string().min(1),
  });

  it('should succeed with valid credentials', () => {
    const credentials = { apiKey: 'test-key', secret: 'test-secret' };

    const result = validateCredentials(TestCredentialsSchema, credentials, 'binance');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual(credentials);
    }
  });

  it('should list the failing fields', () => {
    const result = validateCredentials(TestCredentialsSchema, { apiKey: 'test-key' }, 'binance');

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toBe('Invalid binance credentials:\n  - secret: Required');
  });
});

describe('validateRawData', () => {
  const TestSchema = z.object({ coin: z.string(), amount: z.number() });

  it('should return parsed data', () => {
    const result = validateRawData(TestSchema, { coin: 'CAT', amount: 1 }, 'bybit');
    expect(result._unsafeUnwrap()).toEqual({ coin: 'CAT', amount: 1 });
  });

  it('should describe validation issues', () => {
    const result = validateRawData(TestSchema, { coin: 'CAT', amount: 'one' }, 'bybit');
    expect(result._unsafeUnwrapErr().message).toBe(
      'bybit data validation failed:\n  - amount: Expected number, received string'
    );
  });
});

describe('collectValidEntries', () => {
  const EntrySchema = z.object({ coin: z.string().min(1) });

  function createLogger() {
    const warn = vi.fn();
    // Only warn is used
    const logger = { warn } as unknown as Logger;
    return { logger, warn };
  }

  it('maps valid entries and skips invalid ones', () => {
    const { logger, warn } = createLogger();

    const output = collectValidEntries(
      [{ coin: 'CAT' }, { coin: '' }, 'garbage', { coin: 'SATS' }],
      EntrySchema,
      'bitget',
      (entry) => entry.coin.toLowerCase(),
      logger
    );

    expect(output).toEqual(['cat', 'sats']);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenLastCalledWith('Skipped 2 of 4 bitget catalog entries');
  });

  it('does not warn when everything validates', () => {
    const { logger, warn } = createLogger();

    collectValidEntries([{ coin: 'CAT' }], EntrySchema, 'bitget', (entry) => entry, logger);

    expect(warn).not.toHaveBeenCalled();
  });
});

describe('extractCurrencyInfos', () => {
  it('returns raw payloads in response order', () => {
    expect(extractCurrencyInfos({ CAT: { info: { coin: 'CAT' } }, SATS: { info: { coin: 'SATS' } } })).toEqual([
      { coin: 'CAT' },
      { coin: 'SATS' },
    ]);
  });
});

describe('toCcxtBaseOptions', () => {
  it('maps the timeout to the ccxt option name', () => {
    expect(toCcxtBaseOptions({ timeoutMs: 3000 })).toEqual({ timeout: 3000 });
  });

  it('leaves ccxt defaults alone without a timeout', () => {
    expect(toCcxtBaseOptions({})).toEqual({});
  });
});
