/**
 * Zod Schema Builder
 *
 * Builds Zod validation schemas and config objects from the config registry.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseNumber, parseInt_, parseString } from './parsers.js';

// =============================================================================
// SCHEMA BUILDING
// =============================================================================

/**
 * Build a Zod object schema for a single section
 */
export function buildSectionSchema(
  section: ConfigSectionMeta
): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, option] of Object.entries(section.options)) {
    shape[key] = option.schema;
  }

  return z.object(shape);
}

/**
 * Build a complete Zod schema from the config registry
 */
export function buildConfigSchema(
  registry: ConfigRegistry
): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    shape[key] = buildSectionSchema(section);
  }

  return z.object(shape);
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

/**
 * Get a human-readable type string from a Zod schema.
 */
export function getZodTypeString(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodEnum) {
    const values: readonly string[] = schema.options;
    return values.map((v) => `\`${v}\``).join(' | ');
  }
  if (schema instanceof z.ZodOptional) {
    return `${getZodTypeString(schema.unwrap())} (optional)`;
  }
  return 'unknown';
}

export interface EnvVarDoc {
  envKey: string;
  description: string;
  defaultValue: unknown;
  type: string;
  sensitive: boolean;
  section: string;
}

/**
 * Get all environment variables from the registry
 */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarDoc[] {
  const envVars: EnvVarDoc[] = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        type: getZodTypeString(option.schema),
        sensitive: option.sensitive ?? false,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from Zod schema when not explicitly specified
 */
function inferParserFromSchema(schema: z.ZodTypeAny): ParserType {
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodOptional) return inferParserFromSchema(schema.unwrap());
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser.
 * The result is checked against the option's schema by buildConfig.
 */
function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;

  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue);
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);

    case 'number':
      return parseNumber(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);

    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);

    case 'string':
      if (option.allowedValues && typeof defaultValue === 'string') {
        return parseString(envValue, defaultValue, option.allowedValues);
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, process.env[option.envKey]);
  }

  return result;
}

/**
 * Build the raw config object from registry metadata.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}
