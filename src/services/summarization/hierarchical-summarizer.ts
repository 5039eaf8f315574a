/**
 * Hierarchical Summarizer
 *
 * Level 1: one summary per translated chunk, capped at twice the final limit.
 * Level 0: the Level-1 summaries compressed into a single final summary.
 *
 * Generated lengths are not trusted. With hardCap on, over-long output is cut
 * to the cap and a warning is logged.
 */

import { createComponentLogger } from '../../utils/logger.js';
import type { GenerationClient } from '../generation/types.js';
import type { TranslatedChunk } from '../translation/chunk-translator.js';
import { buildChunkSummaryPrompt, buildFinalSummaryPrompt } from './prompts.js';

const logger = createComponentLogger('summarizer');

const ELLIPSIS = '…';

export interface HierarchicalSummary {
  levelOne: string[];
  finalSummary: string;
}

export interface SummarizerOptions {
  maxChars: number;
  temperature: number;
  hardCap: boolean;
}

/**
 * Cut text to at most `maxChars` code points, replacing the last kept one with an ellipsis
 */
export function truncateToChars(text: string, maxChars: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxChars) {
    return text;
  }
  if (maxChars <= 0) {
    return '';
  }
  return codePoints.slice(0, maxChars - 1).join('') + ELLIPSIS;
}

export class HierarchicalSummarizer {
  constructor(
    private readonly client: GenerationClient,
    private readonly options: SummarizerOptions
  ) {}

  async summarize(chunks: readonly TranslatedChunk[]): Promise<HierarchicalSummary> {
    if (chunks.length === 0) {
      return { levelOne: [], finalSummary: '' };
    }

    const { maxChars, temperature } = this.options;
    const levelOneCap = maxChars * 2;
    const levelOne: string[] = [];

    for (const chunk of chunks) {
      const summary = await this.client.complete({
        prompt: buildChunkSummaryPrompt(chunk.translated, levelOneCap),
        temperature,
        task: 'summarize-chunk',
      });
      levelOne.push(this.enforceCap(summary, levelOneCap, 'level-one'));
    }

    const finalSummary = await this.client.complete({
      prompt: buildFinalSummaryPrompt(levelOne, maxChars),
      temperature,
      task: 'summarize-final',
    });

    return { levelOne, finalSummary: this.enforceCap(finalSummary, maxChars, 'final') };
  }

  private enforceCap(text: string, cap: number, level: 'level-one' | 'final'): string {
    if (!this.options.hardCap) {
      return text;
    }
    const truncated = truncateToChars(text, cap);
    if (truncated !== text) {
      logger.warn({ level, cap, length: Array.from(text).length }, 'Summary exceeded limit, truncated');
    }
    return truncated;
  }
}
