/**
 * Translate CLI Command
 *
 * Runs the pipeline over every unmarked document in the source tree.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import { assertValidConfig, config } from '../../config/index.js';
import { createDigestPipeline } from '../../services/pipeline/digest-pipeline.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

const translateOptionsSchema = z.object({
  src: z.string().optional(),
  dst: z.string().optional(),
});

export function addTranslateCommand(program: Command): void {
  program
    .command('translate')
    .description('Translate, summarize and tag every unprocessed document')
    .option('--src <dir>', 'Source directory (default: MD_DIGEST_SOURCE_DIR)')
    .option('--dst <dir>', 'Output directory (default: MD_DIGEST_OUTPUT_DIR)')
    .action(
      typedAction(translateOptionsSchema, async (options, globalOpts) => {
        try {
          assertValidConfig();
          const pipeline = createDigestPipeline(config, {
            sourceDir: options.src ? resolve(options.src) : undefined,
            outputDir: options.dst ? resolve(options.dst) : undefined,
          });

          const summary = await pipeline.run();
          console.log(formatOutput(summary, globalOpts.format));

          if (summary.failed > 0) {
            process.exitCode = 1;
          }
        } catch (error) {
          handleCliError(error);
        }
      })
    );
}
