/**
 * Retry Configuration Section
 *
 * Generation transport retry settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const retrySection: ConfigSectionMeta = {
  name: 'retry',
  description: 'Generation request retry configuration.',
  options: {
    maxAttempts: {
      envKey: 'MD_DIGEST_RETRY_MAX_ATTEMPTS',
      defaultValue: 3,
      description: 'Maximum attempts per generation request.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    initialDelayMs: {
      envKey: 'MD_DIGEST_RETRY_INITIAL_DELAY_MS',
      defaultValue: 500,
      description: 'Initial delay between retries in milliseconds.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    maxDelayMs: {
      envKey: 'MD_DIGEST_RETRY_MAX_DELAY_MS',
      defaultValue: 8000,
      description: 'Maximum delay between retries in milliseconds.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    backoffMultiplier: {
      envKey: 'MD_DIGEST_RETRY_BACKOFF_MULTIPLIER',
      defaultValue: 2,
      description: 'Backoff multiplier for retry delays.',
      schema: z.number().min(1),
    },
  },
};
