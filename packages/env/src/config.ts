import path from 'node:path';

import { formatZodIssues, type ExchangeCredentials, type VenueId } from '@coinbridge/core';
import { z } from 'zod';

const optionalSecret = z.string().trim().min(1).optional();

const envSchema = z.object({
  COINBRIDGE_CONFIG_PATH: z.string().min(1).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  BINANCE_API_KEY: optionalSecret,
  BINANCE_API_SECRET: optionalSecret,
  BYBIT_API_KEY: optionalSecret,
  BYBIT_API_SECRET: optionalSecret,
  BITGET_API_KEY: optionalSecret,
  BITGET_API_SECRET: optionalSecret,
  BITGET_API_PASSPHRASE: optionalSecret,
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Parse an environment object without touching the cache.
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`Environment validation failed:\n${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Forget the cached environment. Tests call this after changing process.env.
 */
export function resetEnv(): void {
  validatedEnv = undefined;
}

/**
 * Path of the venue config file.
 *
 * Priority:
 * 1. COINBRIDGE_CONFIG_PATH environment variable (if set)
 * 2. process.cwd() + '/coinbridge.config.json' (default)
 */
export function getConfigPath(): string {
  const env = validateEnv();
  return env.COINBRIDGE_CONFIG_PATH ?? path.join(process.cwd(), 'coinbridge.config.json');
}

/**
 * Credentials per venue, taken from the environment. A venue appears only when
 * its full credential set is present: key and secret, plus the passphrase for
 * Bitget.
 */
export function getVenueCredentials(env: ValidatedEnv = validateEnv()): Partial<Record<VenueId, ExchangeCredentials>> {
  const credentials: Partial<Record<VenueId, ExchangeCredentials>> = {};

  if (env.BINANCE_API_KEY && env.BINANCE_API_SECRET) {
    credentials.binance = { apiKey: env.BINANCE_API_KEY, secret: env.BINANCE_API_SECRET };
  }

  if (env.BYBIT_API_KEY && env.BYBIT_API_SECRET) {
    credentials.bybit = { apiKey: env.BYBIT_API_KEY, secret: env.BYBIT_API_SECRET };
  }

  // Bitget signs with a passphrase as well; without one the public catalog is used
  if (env.BITGET_API_KEY && env.BITGET_API_SECRET && env.BITGET_API_PASSPHRASE) {
    credentials.bitget = {
      apiKey: env.BITGET_API_KEY,
      secret: env.BITGET_API_SECRET,
      passphrase: env.BITGET_API_PASSPHRASE,
    };
  }

  return credentials;
}
