import { z } from 'zod';

/**
 * How a match was found: literal/denomination-aware symbol comparison, or by
 * following shared contract identity across venues.
 */
export const MatchSourceSchema = z.enum(['traditional', 'smart']);

export type MatchSource = z.infer<typeof MatchSourceSchema>;

export const MatchRecordSchema = z
  .object({
    venue: z.string(),
    symbol: z.string(),
    network: z.string(),
    contractAddress: z.string(),
    verified: z.boolean(),
    source: MatchSourceSchema,
  })
  .readonly();

export type MatchRecord = z.infer<typeof MatchRecordSchema>;

export const ResolutionResultSchema = z.object({
  originalSymbol: z.string(),
  verifiedMatches: z.array(MatchRecordSchema),
  // Reserved for a lower-confidence tier; always empty today
  possibleMatches: z.array(MatchRecordSchema),
  notes: z.array(z.string()),
});

export type ResolutionResult = z.infer<typeof ResolutionResultSchema>;
