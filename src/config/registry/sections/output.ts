/**
 * Output Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const outputSection: ConfigSectionMeta = {
  name: 'output',
  description: 'Output document and source marking configuration.',
  options: {
    markerPrefix: {
      envKey: 'MD_DIGEST_MARKER_PREFIX',
      defaultValue: '[ds]',
      description: 'Filename prefix given to processed sources. Prefixed files are skipped.',
      schema: z.string().min(1).regex(/^[^/\\]+$/),
    },
    attributionLabel: {
      envKey: 'MD_DIGEST_ATTRIBUTION_LABEL',
      defaultValue: 'deepseek',
      description: 'Name used in the source attribution line.',
      schema: z.string().min(1),
    },
  },
};
