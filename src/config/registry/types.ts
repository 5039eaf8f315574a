/**
 * Config Registry Type Definitions
 *
 * Every option declares its env key, default, description, zod schema and parser.
 */

import type { z } from 'zod';

/**
 * Built-in parser types for env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'number' // parseFloat
  | 'int'; // parseInt

/**
 * Custom parser function type
 */
export type CustomParser<T> = (envValue: string | undefined, defaultValue: T) => T;

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'MD_DIGEST_MODEL') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  /** Description for the `config` command */
  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type or custom parser function */
  parse?: ParserType | CustomParser<T>;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];

  /** Sensitive values (keys) are never printed */
  sensitive?: boolean;
}

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  name: string;
  description: string;
  options: Record<string, ConfigOptionMeta>;
}

/**
 * Complete registry of configuration options
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}

/**
 * Extract the value type from a ConfigOptionMeta
 */
export type OptionValue<T extends ConfigOptionMeta> = T['defaultValue'];

/**
 * Extract config shape from a section
 */
export type SectionConfig<T extends ConfigSectionMeta> = {
  [K in keyof T['options']]: OptionValue<T['options'][K]>;
};
