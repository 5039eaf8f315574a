/**
 * Metadata Synthesizer
 *
 * Derives retrieval tags and a one-sentence description from the summaries and
 * writes them into the front matter.
 */

import { createComponentLogger } from '../../utils/logger.js';
import type { GenerationClient } from '../generation/types.js';
import type { FrontMatter } from '../front-matter/types.js';
import type { HierarchicalSummary } from '../summarization/hierarchical-summarizer.js';
import { buildDescriptionPrompt, buildTagsPrompt } from './prompts.js';

const logger = createComponentLogger('metadata');

const TAG_SEPARATORS = /[,，、•\n\r]+/;

export interface DocumentMetadata {
  tags: string[];
  description: string;
}

export interface MetadataSynthesizerOptions {
  temperature: number;
  descriptionMaxChars: number;
}

/**
 * Split a tag response on commas (ASCII or full-width), 、, bullets and newlines.
 * Empty entries and later duplicates are dropped.
 */
export function parseTags(raw: string): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const part of raw.split(TAG_SEPARATORS)) {
    const tag = part.trim();
    if (tag && !seen.has(tag)) {
      seen.add(tag);
      tags.push(tag);
    }
  }
  return tags;
}

export class MetadataSynthesizer {
  constructor(
    private readonly client: GenerationClient,
    private readonly options: MetadataSynthesizerOptions
  ) {}

  async synthesize(summary: HierarchicalSummary): Promise<DocumentMetadata | undefined> {
    if (summary.finalSummary.trim() === '') {
      return undefined;
    }

    const rawTags = await this.client.complete({
      prompt: buildTagsPrompt(summary.finalSummary, summary.levelOne),
      temperature: this.options.temperature,
      task: 'tags',
    });
    const description = await this.client.complete({
      prompt: buildDescriptionPrompt(summary.finalSummary, this.options.descriptionMaxChars),
      temperature: this.options.temperature,
      task: 'description',
    });

    return { tags: parseTags(rawTags), description };
  }

  /**
   * Synthesize and merge into a copy of the front matter. Empty tag lists leave existing tags alone.
   */
  async apply(frontMatter: FrontMatter, summary: HierarchicalSummary): Promise<FrontMatter> {
    const metadata = await this.synthesize(summary);
    if (!metadata) {
      logger.debug('Empty final summary, skipping tags and description');
      return frontMatter;
    }

    const next: FrontMatter = { ...frontMatter };
    if (metadata.tags.length > 0) {
      next.tags = metadata.tags;
    } else {
      logger.warn('Tag response contained no tags, keeping existing tags');
    }
    next.description = metadata.description;
    return next;
  }
}
