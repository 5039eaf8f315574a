/**
 * Front-Matter Transformer
 *
 * Translates the title, replaces `date` with a normalized `pubDatetime`, and
 * lifts `link` out of the mapping for the attribution line.
 */

import { createComponentLogger } from '../../utils/logger.js';
import type { GenerationClient } from '../generation/types.js';
import { buildTitlePrompt } from '../translation/prompts.js';
import { normalizeDate } from './date-normalizer.js';
import type { FrontMatter } from './types.js';

const logger = createComponentLogger('front-matter');

export interface TransformedFrontMatter {
  frontMatter: FrontMatter;
  link: string | undefined;
}

export interface FrontMatterTransformerOptions {
  targetLanguage: string;
  temperature: number;
}

export class FrontMatterTransformer {
  constructor(
    private readonly client: GenerationClient,
    private readonly options: FrontMatterTransformerOptions
  ) {}

  /**
   * Returns a new mapping; the input is not modified
   */
  async transform(input: FrontMatter): Promise<TransformedFrontMatter> {
    const frontMatter: FrontMatter = { ...input };

    const title = frontMatter.title;
    if (title !== undefined && title !== null && String(title).trim() !== '') {
      frontMatter.title = await this.client.complete({
        prompt: buildTitlePrompt(String(title), this.options.targetLanguage),
        temperature: this.options.temperature,
        task: 'title',
      });
    }

    if ('date' in frontMatter) {
      const raw = frontMatter.date;
      delete frontMatter.date;
      const normalized = normalizeDate(raw);
      if (typeof raw === 'string' && normalized === raw) {
        logger.warn({ date: raw }, 'Unrecognized date format, keeping raw value');
      }
      frontMatter.pubDatetime = normalized;
    }

    let link: string | undefined;
    if ('link' in frontMatter) {
      const raw = frontMatter.link;
      delete frontMatter.link;
      link = raw === undefined || raw === null || String(raw).trim() === '' ? undefined : String(raw).trim();
    }

    return { frontMatter, link };
  }
}
