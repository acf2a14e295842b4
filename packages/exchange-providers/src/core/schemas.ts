import { z } from 'zod';

/**
 * Venues encode flags as booleans, "true"/"false" or "1"/"0".
 */
export const VenueFlagSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Optional free-text field that venues send as null, "" or omit entirely.
 */
export const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => (value === null || value === undefined || value.trim() === '' ? undefined : value.trim()));

/**
 * Numeric amount sent as a string or a number. Kept as text so callers
 * decide how blanks are interpreted.
 */
export const AmountTextSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));
