/**
 * Logging Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const loggingSection: ConfigSectionMeta = {
  name: 'logging',
  description: 'Logging configuration.',
  options: {
    level: {
      envKey: 'LOG_LEVEL',
      defaultValue: 'info',
      description: 'Log level: fatal, error, warn, info, debug, or trace.',
      schema: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']),
      allowedValues: ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const,
    },
    debug: {
      envKey: 'MD_DIGEST_DEBUG',
      defaultValue: false,
      description: 'Log every prompt and response at debug level.',
      schema: z.boolean(),
    },
  },
};
