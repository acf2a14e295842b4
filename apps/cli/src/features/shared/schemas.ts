import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const ConfigPathSchema = z.object({
  config: z.string().trim().min(1, '--config requires a path').optional(),
});

export const ResolveCommandOptionsSchema = JsonFlagSchema.merge(ConfigPathSchema).extend({
  timeout: z.coerce.number().int().positive('--timeout must be a positive number of milliseconds').optional(),
});

export const NetworksCommandOptionsSchema = JsonFlagSchema;

/**
 * Ticker as typed by the user: letters and digits only.
 */
export const SymbolArgumentSchema = z
  .string()
  .trim()
  .min(1, 'A symbol is required')
  .regex(/^[A-Za-z0-9]+$/, 'Symbols contain only letters and digits');
