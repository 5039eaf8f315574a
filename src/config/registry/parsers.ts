/**
 * Config Parser Functions
 *
 * String-to-type conversion for environment variable values.
 */

import { resolve } from 'node:path';

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  if (allowedValues && !allowedValues.includes(lower)) {
    return defaultValue;
  }
  return lower;
}

/**
 * Expand tilde (~) to home directory in file paths.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function todayStamp(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

/**
 * Resolve a run directory: explicit env value wins, otherwise `<prefix>_<today>`
 * relative to the working directory.
 */
export function resolveRunDir(envValue: string | undefined, prefix: string): string {
  if (envValue) {
    return resolve(expandTilde(envValue));
  }
  return resolve(`${prefix}_${todayStamp()}`);
}
