/**
 * Chunking
 *
 * Heading-aware segmentation with token-bounded, overlapping windows.
 *
 * @example
 * ```typescript
 * const segmenter = createMarkdownSegmenter({ tokenBudget: 8000, overlapTokens: 200 });
 * const { chunks } = segmenter.segment(body);
 * ```
 */

export {
  MarkdownSegmenter,
  createMarkdownSegmenter,
  splitSections,
  assertSegmenterConfig,
} from './markdown-segmenter.js';
export {
  TiktokenEstimator,
  CharEstimator,
  createTokenEstimator,
} from './token-estimator.js';
export type { TokenEstimator, TokenEstimatorKind } from './token-estimator.js';

export type {
  Chunk,
  Section,
  SegmenterConfig,
  SegmentationResult,
  SegmentationStats,
} from './types.js';

export { DEFAULT_SEGMENTER_CONFIG, CHARS_PER_TOKEN } from './types.js';
