/**
 * Core error definitions
 *
 * Error classes, codes, and factory functions shared by every layer
 * (config, services, pipeline, cli).
 */

export class MdDigestError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MdDigestError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  INVALID_PARAMETER: 'E1004',

  // Document errors (2000-2999)
  NOT_FOUND: 'E2000',
  FRONT_MATTER_PARSE: 'E2100',

  // Filesystem errors (4000-4999)
  FILESYSTEM_ERROR: 'E4000',
  FILE_READ: 'E4100',
  FILE_WRITE: 'E4101',
  MARK_FAILED: 'E4102',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',

  // Generation errors (7000-7999)
  GENERATION_UNAVAILABLE: 'E7000',
  GENERATION_FAILED: 'E7001',
  GENERATION_EMPTY: 'E7002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Failure talking to the generation service
 */
export class GenerationError extends MdDigestError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.GENERATION_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'GenerationError';
  }
}

/**
 * Filesystem read/write/rename failure
 */
export class FileSystemError extends MdDigestError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, path });
    this.name = 'FileSystemError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): MdDigestError {
  return new MdDigestError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.INVALID_PARAMETER,
    { field, suggestion }
  );
}

/**
 * Create a front-matter parse error. Callers log it and continue with empty front matter.
 */
export function createFrontMatterError(reason: string): MdDigestError {
  return new MdDigestError(`Front matter could not be parsed: ${reason}`, ErrorCodes.FRONT_MATTER_PARSE, {
    reason,
  });
}

/**
 * Create a generation error for a specific task
 */
export function createGenerationError(
  task: string,
  message: string,
  details?: Record<string, unknown>,
  code: ErrorCode = ErrorCodes.GENERATION_FAILED
): GenerationError {
  return new GenerationError(`Generation failed (${task}): ${message}`, code, {
    task,
    ...details,
    suggestion: 'Check MD_DIGEST_BASE_URL, MD_DIGEST_MODEL and MD_DIGEST_API_KEY',
  });
}

/**
 * Create a generation unavailable error
 */
export function createGenerationUnavailableError(): GenerationError {
  return new GenerationError(
    'Generation service not configured: MD_DIGEST_API_KEY is not set',
    ErrorCodes.GENERATION_UNAVAILABLE,
    { suggestion: 'Set MD_DIGEST_API_KEY in the environment or a .env file' }
  );
}

/**
 * Wrap a filesystem failure with the operation and path
 */
export function createFileSystemError(
  operation: 'read' | 'write' | 'mark',
  path: string,
  cause: unknown
): FileSystemError {
  const codes = {
    read: ErrorCodes.FILE_READ,
    write: ErrorCodes.FILE_WRITE,
    mark: ErrorCodes.MARK_FAILED,
  } as const;
  const reason = cause instanceof Error ? cause.message : String(cause);
  const error = new FileSystemError(`Failed to ${operation} ${path}: ${reason}`, codes[operation], path, {
    operation,
  });
  error.cause = cause;
  return error;
}
