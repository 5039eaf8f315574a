/**
 * Sanitization utilities for logging
 * Keeps API keys out of log output
 */

/**
 * Key names whose values are never logged
 */
const SENSITIVE_KEY_PATTERNS = [/api[-_]?key/i, /token/i, /secret/i, /password/i, /authorization/i];

/**
 * Key formats masked wherever they appear in a string
 */
const API_KEY_PATTERNS = [
  // OpenAI-compatible keys: sk-... (DeepSeek uses the same shape)
  /sk-[a-zA-Z0-9\-_]{20,}/g,

  // Bearer tokens
  /bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
];

const REDACTED = '***REDACTED***';

/**
 * Sanitize a value for safe logging
 * Recursively processes objects and arrays to mask sensitive data
 */
export function sanitizeForLogging(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return maskSensitiveStrings(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLogging(item));
  }

  if (value instanceof Error) {
    return sanitizeError(value);
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeForLogging(val);
    }
    return sanitized;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Mask API keys in a string, keeping the first three characters for context
 */
export function maskSensitiveStrings(str: string): string {
  let masked = str;
  for (const pattern of API_KEY_PATTERNS) {
    masked = masked.replace(pattern, (match) => `${match.substring(0, 3)}...${REDACTED}`);
  }
  return masked;
}

/**
 * Sanitize error objects for logging
 * Preserves name, message and stack while masking sensitive data
 */
export function sanitizeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      ...Object.fromEntries(
        Object.entries(error).map(([key, value]) => [
          key,
          isSensitiveKey(key) ? REDACTED : sanitizeForLogging(value),
        ])
      ),
      name: error.name,
      message: maskSensitiveStrings(error.message),
      stack: error.stack ? maskSensitiveStrings(error.stack) : undefined,
    };
  }

  return sanitizeForLogging(error);
}
