import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { formatZodIssues, fromZod } from '../zod-utils.js';

const schema = z.object({
  venue: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

describe('fromZod', () => {
  it('returns ok with the parsed value', () => {
    const result = fromZod(schema, { venue: 'bybit', timeoutMs: 1000 });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ venue: 'bybit', timeoutMs: 1000 });
    }
  });

  it('returns err with the zod error', () => {
    const result = fromZod(schema, { venue: '', timeoutMs: 1000 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.issues[0]?.path).toEqual(['venue']);
    }
  });
});

describe('formatZodIssues', () => {
  it('renders one bullet per issue with its path', () => {
    const parsed = schema.safeParse({ venue: 'bybit', timeoutMs: -5 });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodIssues(parsed.error)).toBe('  - timeoutMs: Number must be greater than 0');
    }
  });

  it('labels root-level issues', () => {
    const parsed = z.string().safeParse(42);

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodIssues(parsed.error)).toBe('  - (root): Expected string, received number');
    }
  });
});
