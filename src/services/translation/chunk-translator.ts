/**
 * Chunk Translator
 *
 * Translates chunks one at a time, in order. Chunks are never sent concurrently;
 * the first failure aborts the document. Each translation keeps its source
 * chunk's leading and trailing whitespace, so joined chunks keep their line breaks.
 */

import { createComponentLogger } from '../../utils/logger.js';
import type { Chunk } from '../chunking/types.js';
import type { GenerationClient } from '../generation/types.js';
import { buildTranslationPrompt } from './prompts.js';

const logger = createComponentLogger('translator');

export interface TranslatedChunk {
  index: number;
  sectionIndex: number;
  source: string;
  translated: string;
}

export interface ChunkTranslatorOptions {
  targetLanguage: string;
  temperature: number;
}

export class ChunkTranslator {
  constructor(
    private readonly client: GenerationClient,
    private readonly options: ChunkTranslatorOptions
  ) {}

  async translateChunks(chunks: readonly Chunk[]): Promise<TranslatedChunk[]> {
    const results: TranslatedChunk[] = [];

    for (const chunk of chunks) {
      const text = await this.client.complete({
        prompt: buildTranslationPrompt(chunk.content, this.options.targetLanguage),
        temperature: this.options.temperature,
        task: 'translate',
      });
      results.push({
        index: chunk.index,
        sectionIndex: chunk.sectionIndex,
        source: chunk.content,
        translated: withSourceWhitespace(chunk.content, text),
      });
      logger.debug(
        { chunk: chunk.index, of: chunks.length, sourceChars: chunk.content.length, translatedChars: text.length },
        'Chunk translated'
      );
    }

    return results;
  }
}

/**
 * Wrap the trimmed translation in the whitespace that surrounds the source text
 */
export function withSourceWhitespace(source: string, translated: string): string {
  const leading = /^\s*/.exec(source)?.[0] ?? '';
  const trailing = /\s*$/.exec(source.slice(leading.length))?.[0] ?? '';
  return `${leading}${translated.trim()}${trailing}`;
}

/**
 * Concatenate translated chunks in order, with no delimiter
 */
export function joinTranslated(chunks: readonly TranslatedChunk[]): string {
  return chunks.map((c) => c.translated).join('');
}
