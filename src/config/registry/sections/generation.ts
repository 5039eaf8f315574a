/**
 * Generation Configuration Section
 *
 * Text-generation service endpoint, model and sampling settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const generationSection: ConfigSectionMeta = {
  name: 'generation',
  description: 'Text-generation service configuration (OpenAI-compatible chat completions).',
  options: {
    model: {
      envKey: 'MD_DIGEST_MODEL',
      defaultValue: 'deepseek-chat',
      description: 'Model identifier sent with every request.',
      schema: z.string().regex(/^[a-zA-Z0-9._:/-]+$/),
    },
    baseUrl: {
      envKey: 'MD_DIGEST_BASE_URL',
      defaultValue: 'https://api.deepseek.com',
      description: 'Base endpoint of the generation service.',
      schema: z.string().url(),
    },
    apiKey: {
      envKey: 'MD_DIGEST_API_KEY',
      defaultValue: undefined,
      description: 'API key for the generation service.',
      schema: z.string().optional(),
      sensitive: true,
    },
    timeoutMs: {
      envKey: 'MD_DIGEST_TIMEOUT_MS',
      defaultValue: 600000,
      description: 'Per-request transport timeout in milliseconds.',
      schema: z.number().int().min(1000),
      parse: 'int',
    },
    targetLanguage: {
      envKey: 'MD_DIGEST_TARGET_LANGUAGE',
      defaultValue: '简体中文',
      description: 'Language the title and body are translated into.',
      schema: z.string().min(1),
    },
    translationTemperature: {
      envKey: 'MD_DIGEST_TRANSLATION_TEMPERATURE',
      defaultValue: 1.3,
      description: 'Sampling temperature for title and body translation.',
      schema: z.number().min(0).max(2),
    },
    summaryTemperature: {
      envKey: 'MD_DIGEST_SUMMARY_TEMPERATURE',
      defaultValue: 1.0,
      description: 'Sampling temperature for summaries, tags and description.',
      schema: z.number().min(0).max(2),
    },
  },
};
