/**
 * CLI Error Handling
 */

import { mapError } from '../../utils/error-mapper.js';

/**
 * Write the mapped error to stderr as JSON and exit 1
 */
export function handleCliError(error: unknown): never {
  const mapped = mapError(error);

  const output = {
    error: mapped.message,
    code: mapped.code,
    ...(mapped.details ? { details: mapped.details } : {}),
  };

  console.error(JSON.stringify(output, null, 2));
  process.exit(1);
}
