import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { parseDecimal } from '../utils/decimal-utils.js';

// Decimal schema - accepts string, number, or Decimal instance, transforms to Decimal
// Venues report fees and limits both as numbers and as numeric strings
export const DecimalSchema = z.union([z.string(), z.number(), z.instanceof(Decimal)]).transform((val) => {
  if (val instanceof Decimal) return val;
  return parseDecimal(val);
});

/**
 * Non-empty, trimmed identifier string.
 */
export const NonEmptyStringSchema = z.string().trim().min(1);
