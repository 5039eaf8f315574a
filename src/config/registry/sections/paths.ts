/**
 * Paths Configuration Section
 *
 * Source and output roots. Both default to a directory named after today's date.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { resolveRunDir } from '../parsers.js';

export const pathsSection: ConfigSectionMeta = {
  name: 'paths',
  description: 'Source and output directory configuration.',
  options: {
    sourceDir: {
      envKey: 'MD_DIGEST_SOURCE_DIR',
      defaultValue: 'raw_<YYYY-MM-DD>',
      description: 'Root directory scanned recursively for Markdown sources. Supports ~ expansion.',
      schema: z.string().min(1),
      parse: (value) => resolveRunDir(value, 'raw'),
    },
    outputDir: {
      envKey: 'MD_DIGEST_OUTPUT_DIR',
      defaultValue: 'translated_<YYYY-MM-DD>',
      description: 'Root directory receiving processed documents at mirrored relative paths.',
      schema: z.string().min(1),
      parse: (value) => resolveRunDir(value, 'translated'),
    },
  },
};
