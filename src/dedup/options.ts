import { z } from 'zod';

import { env } from '../config/index.js';
import { InvalidOptionsError } from '../lib/errors.js';

export const DedupOptionsSchema = z.object({
  hashSize: z.number().int().min(2).max(64).default(env.HASH_SIZE),
  threshold: z.number().int().min(0).default(env.HASH_DIFF_THRESHOLD),
  maxImageSize: z.number().int().positive().default(env.MAX_IMAGE_SIZE),
  concurrency: z.number().int().min(1).max(64).default(env.FINGERPRINT_CONCURRENCY),
  itemTimeoutMs: z.number().int().min(1).default(env.ITEM_TIMEOUT_MS)
});

export type DedupOptionsInput = z.input<typeof DedupOptionsSchema>;
export type DedupOptions = z.output<typeof DedupOptionsSchema>;

/**
 * Fill per-run options from environment defaults and validate them
 */
export function resolveDedupOptions(input: DedupOptionsInput = {}): DedupOptions {
  const result = DedupOptionsSchema.safeParse(input);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidOptionsError(`Invalid dedup options: ${errors}`);
  }

  return result.data;
}
