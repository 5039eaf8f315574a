/**
 * Markdown Segmenter
 *
 * Splits a document body into heading-bounded sections, then windows any
 * section over the token budget into overlapping chunks.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { createValidationError } from '../../core/errors.js';
import { createTokenEstimator, type TokenEstimator } from './token-estimator.js';
import {
  DEFAULT_SEGMENTER_CONFIG,
  type Chunk,
  type Section,
  type SegmentationResult,
  type SegmenterConfig,
} from './types.js';

const logger = createComponentLogger('segmenter');

const HEADING_PATTERN = /^#{1,6}\s/;

/**
 * Split text into lines, each keeping its terminator
 */
function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Split a Markdown body into sections. Every heading line starts a new section,
 * except one at the very start of the body. Concatenating the sections gives the body back.
 */
export function splitSections(body: string): Section[] {
  const sections: Section[] = [];
  let buffer: string[] = [];

  const flush = (): void => {
    sections.push({ index: sections.length, content: buffer.join('') });
    buffer = [];
  };

  for (const line of splitLinesKeepEnds(body)) {
    if (HEADING_PATTERN.test(line) && buffer.length > 0) {
      flush();
    }
    buffer.push(line);
  }

  if (buffer.length > 0) {
    flush();
  }

  return sections;
}

/**
 * Reject budget/overlap pairs that would not make progress
 */
export function assertSegmenterConfig(config: SegmenterConfig): void {
  if (!Number.isInteger(config.tokenBudget) || config.tokenBudget <= 0) {
    throw createValidationError('tokenBudget', `must be a positive integer (got ${config.tokenBudget})`);
  }
  if (!Number.isInteger(config.overlapTokens) || config.overlapTokens < 0) {
    throw createValidationError(
      'overlapTokens',
      `must be a non-negative integer (got ${config.overlapTokens})`
    );
  }
  if (config.overlapTokens >= config.tokenBudget) {
    throw createValidationError(
      'overlapTokens',
      `must be less than tokenBudget (${config.overlapTokens} >= ${config.tokenBudget})`,
      'Lower MD_DIGEST_CHUNK_OVERLAP or raise MD_DIGEST_CHUNK_TOKENS'
    );
  }
}

export class MarkdownSegmenter {
  private readonly config: SegmenterConfig;

  constructor(
    config: Partial<SegmenterConfig> = {},
    private readonly estimator: TokenEstimator = createTokenEstimator()
  ) {
    this.config = { ...DEFAULT_SEGMENTER_CONFIG, ...config };
    assertSegmenterConfig(this.config);
  }

  getConfig(): SegmenterConfig {
    return { ...this.config };
  }

  getEstimator(): TokenEstimator {
    return this.estimator;
  }

  /**
   * Segment a body into sections and token-bounded chunks, in document order
   */
  segment(body: string): SegmentationResult {
    const { tokenBudget, overlapTokens } = this.config;
    const sections = splitSections(body);
    const chunks: Chunk[] = [];
    let splitCount = 0;
    let totalTokens = 0;

    for (const section of sections) {
      const tokens = this.estimator.estimate(section.content);
      totalTokens += tokens;

      if (tokens <= tokenBudget) {
        chunks.push({
          index: chunks.length,
          sectionIndex: section.index,
          content: section.content,
          tokenEstimate: tokens,
          overlapPrevious: 0,
          split: false,
        });
        continue;
      }

      splitCount++;
      const windows = this.estimator.slice(section.content, tokenBudget, overlapTokens);
      windows.forEach((content, position) => {
        chunks.push({
          index: chunks.length,
          sectionIndex: section.index,
          content,
          tokenEstimate: this.estimator.estimate(content),
          overlapPrevious: position === 0 ? 0 : overlapTokens,
          split: true,
        });
      });

      logger.debug(
        { section: section.index, tokens, windows: windows.length, exact: this.estimator.exact },
        'Split oversized section'
      );
    }

    return {
      sections,
      chunks,
      stats: {
        totalSections: sections.length,
        totalChunks: chunks.length,
        splitSections: splitCount,
        maxChunkTokens: chunks.reduce((max, c) => Math.max(max, c.tokenEstimate), 0),
        totalTokens,
      },
    };
  }
}

/**
 * Create a segmenter from config values
 */
export function createMarkdownSegmenter(
  config?: Partial<SegmenterConfig>,
  estimator?: TokenEstimator
): MarkdownSegmenter {
  return new MarkdownSegmenter(config, estimator);
}
