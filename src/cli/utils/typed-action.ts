/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander hands actions loosely typed option bags. Options are parsed with a
 * zod schema so handlers receive checked values.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { createValidationError } from '../../core/errors.js';
import { formatZodErrors } from '../../config/registry/schema-builder.js';

const globalOptionsSchema = z.object({
  format: z.enum(['json', 'table']).default('json'),
});

/**
 * Global CLI options available to all commands via --option flags
 */
export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw createValidationError('options', formatZodErrors(result.error).join('; '));
  }
  return result.data;
}

/**
 * Wrap a handler for commands without positional arguments
 *
 * @example
 * ```typescript
 * program
 *   .command('translate')
 *   .option('--src <dir>')
 *   .action(typedAction(z.object({ src: z.string().optional() }), async (options, globalOpts) => {
 *     console.log(options.src, globalOpts.format);
 *   }));
 * ```
 */
export function typedAction<TOptions>(
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>,
  handler: (options: TOptions, globalOpts: GlobalOptions) => Promise<void>
): (options: unknown, cmd: Command) => Promise<void> {
  return async (options: unknown, cmd: Command) => {
    const globalOpts = parseOptions(globalOptionsSchema, cmd.optsWithGlobals());
    await handler(parseOptions(schema, options), globalOpts);
  };
}

/**
 * Wrap a handler for commands taking one positional argument
 */
export function typedArgAction<TOptions>(
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>,
  handler: (arg: string, options: TOptions, globalOpts: GlobalOptions) => Promise<void>
): (arg: string, options: unknown, cmd: Command) => Promise<void> {
  return async (arg: string, options: unknown, cmd: Command) => {
    const globalOpts = parseOptions(globalOptionsSchema, cmd.optsWithGlobals());
    await handler(arg, parseOptions(schema, options), globalOpts);
  };
}
