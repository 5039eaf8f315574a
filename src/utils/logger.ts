/**
 * Structured logging utility using pino
 *
 * - Level from LOG_LEVEL
 * - Pretty printing outside production, JSON in production
 * - Always written to stderr: stdout carries command results
 * - Component-based context
 */

import pino from 'pino';
import { sanitizeError } from './sanitize.js';
import { config } from '../config/index.js';

// Keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const pinoOptions: pino.LoggerOptions = {
  level: config.logging.debug ? 'debug' : config.logging.level,
  enabled: !isTest,
  redact: {
    paths: [
      'apiKey',
      'api_key',
      'MD_DIGEST_API_KEY',
      'token',
      'authorization',
      'Authorization',
      '*.apiKey',
      '*.api_key',
      '*.token',
      'headers.authorization',
      'headers.Authorization',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: sanitizeError,
  },
};

// No transport worker under test or in production
export const logger =
  isTest || config.runtime.nodeEnv === 'production'
    ? pino(pinoOptions, pino.destination({ dest: 2, sync: false }))
    : pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            destination: 2,
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      });

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'segmenter', 'pipeline')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
