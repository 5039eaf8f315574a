import { MdDigestError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  if (error instanceof MdDigestError) {
    return {
      message: error.message,
      code: error.code,
      details: error.context,
    };
  }

  if (error instanceof Error) {
    const message = error.message;

    // Node filesystem errors carry an errno code
    if ('code' in error && typeof error.code === 'string' && error.code.startsWith('E')) {
      return { message, code: ErrorCodes.FILESYSTEM_ERROR, details: { errno: error.code } };
    }
    if (message.includes('Validation error') || message.includes('is required')) {
      return { message, code: ErrorCodes.INVALID_PARAMETER };
    }
    if (message.includes('not found')) {
      return { message, code: ErrorCodes.NOT_FOUND };
    }

    logger.warn({ error: message }, 'Unmapped internal error');
    return { message, code: ErrorCodes.INTERNAL_ERROR };
  }

  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
  };
}
