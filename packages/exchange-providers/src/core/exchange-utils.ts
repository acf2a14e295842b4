import { formatZodIssues, wrapError } from '@coinbridge/core';
import type { Logger } from '@coinbridge/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';

import type { VenueClientOptions } from './types.js';

/**
 * ccxt constructor settings shared by every venue.
 */
export function toCcxtBaseOptions(options: VenueClientOptions): { timeout?: number } {
  return options.timeoutMs === undefined ? {} : { timeout: options.timeoutMs };
}

/**
 * Validate credentials against a Zod schema
 */
export function validateCredentials<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  credentials: unknown,
  venue: string
): Result<T, Error> {
  const validationResult = schema.safeParse(credentials);
  if (!validationResult.success) {
    return err(new Error(`Invalid ${venue} credentials:\n${formatZodIssues(validationResult.error)}`));
  }
  return ok(validationResult.data);
}

/**
 * Validate raw data against a Zod schema
 */
export function validateRawData<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  rawData: unknown,
  venue: string
): Result<T, Error> {
  try {
    const parsed = schema.parse(rawData);
    return ok(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      return err(new Error(`${venue} data validation failed:\n${formatZodIssues(error)}`));
    }
    return wrapError(error, `${venue} data validation failed`);
  }
}

/**
 * Validate every raw entry and map the valid ones. Invalid entries are logged
 * and dropped so one odd coin cannot hide the rest of the catalog.
 */
export function collectValidEntries<TValidated, TOutput>(
  rawEntries: readonly unknown[],
  schema: ZodType<TValidated, ZodTypeDef, unknown>,
  venue: string,
  mapper: (entry: TValidated) => TOutput,
  logger: Logger
): TOutput[] {
  const output: TOutput[] = [];
  let skipped = 0;

  for (const raw of rawEntries) {
    const validation = validateRawData(schema, raw, venue);
    if (validation.isErr()) {
      skipped++;
      logger.warn({ error: validation.error.message }, `Skipping ${venue} catalog entry`);
      continue;
    }
    output.push(mapper(validation.value));
  }

  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} of ${rawEntries.length} ${venue} catalog entries`);
  }

  return output;
}

/**
 * Raw `info` payloads of a ccxt fetchCurrencies() response, in response order.
 */
export function extractCurrencyInfos(currencies: Record<string, { info?: unknown }>): unknown[] {
  return Object.values(currencies).map((currency) => currency.info);
}
