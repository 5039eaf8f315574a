/**
 * Centralized configuration module
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.chunking.tokenBudget);
 */

import { configRegistry, buildConfigSchema, buildConfigFromRegistry } from './registry/index.js';
import { formatZodErrors } from './registry/schema-builder.js';
import { createValidationError } from '../core/errors.js';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export type TokenizerKind = 'cl100k_base' | 'chars';

export interface Config {
  paths: {
    sourceDir: string;
    outputDir: string;
  };
  generation: {
    model: string;
    baseUrl: string;
    apiKey: string | undefined;
    timeoutMs: number;
    targetLanguage: string;
    translationTemperature: number;
    summaryTemperature: number;
  };
  chunking: {
    tokenBudget: number;
    overlapTokens: number;
    tokenizer: TokenizerKind;
  };
  summary: {
    maxChars: number;
    hardCap: boolean;
    descriptionMaxChars: number;
  };
  output: {
    markerPrefix: string;
    attributionLabel: string;
  };
  logging: {
    level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
    debug: boolean;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
  };
  runtime: {
    nodeEnv: string;
  };
}

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

const configSchema = buildConfigSchema(configRegistry);

/**
 * Problems that the per-option schemas cannot see
 */
function crossFieldIssues(config: Config): string[] {
  const issues: string[] = [];
  if (config.chunking.overlapTokens >= config.chunking.tokenBudget) {
    issues.push(
      `chunking.overlapTokens: must be less than chunking.tokenBudget (${config.chunking.overlapTokens} >= ${config.chunking.tokenBudget})`
    );
  }
  return issues;
}

/**
 * List every configuration problem without throwing
 */
export function collectConfigIssues(config: Config): string[] {
  const result = configSchema.safeParse(config);
  const issues = result.success ? [] : formatZodErrors(result.error);
  return [...issues, ...crossFieldIssues(config)];
}

/**
 * Build configuration from registry metadata.
 * This is the single source of truth - all env var definitions live in the registry.
 */
export function buildConfig(): Config {
  // Double-cast needed as the registry returns Record<string, unknown>; validated below
  const config = buildConfigFromRegistry(configRegistry) as unknown as Config;

  // Warn early in development; commands call assertValidConfig before doing work
  if (process.env.NODE_ENV !== 'production') {
    const issues = collectConfigIssues(config);
    if (issues.length > 0) {
      console.warn(`Config validation warnings:\n${issues.map((e) => `  - ${e}`).join('\n')}`);
    }
  }

  return config;
}

// Create the singleton config instance
export const config: Config = buildConfig();

/**
 * Throw a validation error listing every problem with the given config
 */
export function assertValidConfig(target: Config = config): void {
  const issues = collectConfigIssues(target);
  if (issues.length > 0) {
    throw createValidationError(
      'config',
      `Configuration validation failed:\n${issues.map((e) => `  - ${e}`).join('\n')}`
    );
  }
}

/**
 * Reload configuration from environment variables.
 * WARNING: This mutates the config object. Only use in tests.
 */
export function reloadConfig(): void {
  const newConfig = buildConfig();
  for (const key of Object.keys(newConfig) as Array<keyof Config>) {
    Object.assign(config[key], newConfig[key]);
  }
}

// =============================================================================
// TEST UTILITIES - Config snapshot and restore for test isolation
// =============================================================================

/**
 * Create a snapshot of the current config state.
 */
export function snapshotConfig(): Config {
  return structuredClone(config);
}

/**
 * Restore config from a previously saved snapshot.
 * Does NOT modify environment variables - only the config object.
 */
export function restoreConfig(snapshot: Config): void {
  for (const key of Object.keys(snapshot) as Array<keyof Config>) {
    Object.assign(config[key], snapshot[key]);
  }
}

/**
 * Run a function with temporary environment variable overrides.
 * Config state is saved, reloaded from the overrides, and restored afterwards.
 *
 * @example
 * await withTestEnv({ MD_DIGEST_CHUNK_TOKENS: '100' }, () => {
 *   expect(config.chunking.tokenBudget).toBe(100);
 * });
 */
export async function withTestEnv<T>(
  envOverrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const configSnapshot = snapshotConfig();
  const envSnapshot: Record<string, string | undefined> = {};

  for (const key of Object.keys(envOverrides)) {
    envSnapshot[key] = process.env[key];
  }

  try {
    for (const [key, value] of Object.entries(envOverrides)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    reloadConfig();

    return await testFn();
  } finally {
    for (const [key, value] of Object.entries(envSnapshot)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    restoreConfig(configSnapshot);
  }
}

export { configRegistry } from './registry/index.js';
export { getAllEnvVars } from './registry/schema-builder.js';

export default config;
