/**
 * Summary Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const summarySection: ConfigSectionMeta = {
  name: 'summary',
  description: 'Summary and metadata length configuration.',
  options: {
    maxChars: {
      envKey: 'MD_DIGEST_SUMMARY_CHARS',
      defaultValue: 200,
      description: 'Character cap requested for the final summary. Chunk summaries get twice this.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    hardCap: {
      envKey: 'MD_DIGEST_SUMMARY_HARD_CAP',
      defaultValue: true,
      description: 'Truncate summaries that exceed their requested cap.',
      schema: z.boolean(),
    },
    descriptionMaxChars: {
      envKey: 'MD_DIGEST_DESCRIPTION_CHARS',
      defaultValue: 50,
      description: 'Character cap requested for the one-sentence description.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
  },
};
