/**
 * Segment CLI Command
 *
 * Dry run of the segmenter over one document. No generation requests are made.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { createFileSystemError } from '../../core/errors.js';
import { MarkdownSegmenter } from '../../services/chunking/markdown-segmenter.js';
import { createTokenEstimator } from '../../services/chunking/token-estimator.js';
import { splitFrontMatter } from '../../services/front-matter/front-matter.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedArgAction } from '../utils/typed-action.js';

const segmentOptionsSchema = z.object({
  tokens: z.coerce.number().int().positive().optional(),
  overlap: z.coerce.number().int().nonnegative().optional(),
});

export function addSegmentCommand(program: Command): void {
  program
    .command('segment')
    .description('Show how a document would be chunked')
    .argument('<file>', 'Markdown document')
    .option('--tokens <n>', 'Token budget per chunk (default: MD_DIGEST_CHUNK_TOKENS)')
    .option('--overlap <n>', 'Overlap between windows (default: MD_DIGEST_CHUNK_OVERLAP)')
    .action(
      typedArgAction(segmentOptionsSchema, async (file, options, globalOpts) => {
        try {
          let text: string;
          try {
            text = await readFile(file, 'utf-8');
          } catch (error) {
            throw createFileSystemError('read', file, error);
          }

          const segmenter = new MarkdownSegmenter(
            {
              tokenBudget: options.tokens ?? config.chunking.tokenBudget,
              overlapTokens: options.overlap ?? config.chunking.overlapTokens,
            },
            createTokenEstimator(config.chunking.tokenizer)
          );
          const { body } = splitFrontMatter(text);
          const { chunks, stats } = segmenter.segment(body);

          const result = {
            file,
            estimator: segmenter.getEstimator().kind,
            sections: stats.totalSections,
            splitSections: stats.splitSections,
            totalTokens: stats.totalTokens,
            chunks: chunks.map((chunk) => ({
              index: chunk.index,
              section: chunk.sectionIndex,
              tokens: chunk.tokenEstimate,
              split: chunk.split,
              firstLine: (chunk.content.split('\n').find((line) => line.trim() !== '') ?? '').trim(),
            })),
          };

          console.log(formatOutput(result, globalOpts.format));
        } catch (error) {
          handleCliError(error);
        }
      })
    );
}
