/**
 * Chunking Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const chunkingSection: ConfigSectionMeta = {
  name: 'chunking',
  description: 'Document segmentation configuration.',
  options: {
    tokenBudget: {
      envKey: 'MD_DIGEST_CHUNK_TOKENS',
      defaultValue: 8000,
      description: 'Maximum estimated tokens per chunk.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    overlapTokens: {
      envKey: 'MD_DIGEST_CHUNK_OVERLAP',
      defaultValue: 200,
      description: 'Tokens shared by adjacent chunks of a split section. Must be below the chunk budget.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    tokenizer: {
      envKey: 'MD_DIGEST_TOKENIZER',
      defaultValue: 'cl100k_base',
      description: 'Token estimator: cl100k_base (exact) or chars (4 characters per token).',
      schema: z.enum(['cl100k_base', 'chars']),
      allowedValues: ['cl100k_base', 'chars'] as const,
    },
  },
};
