/**
 * Chunking Types
 *
 * Sections and token-bounded chunks of a Markdown body
 */

/**
 * A heading-bounded run of body text (or the run before the first heading).
 * Sections are ordered, non-overlapping, and joined back they equal the body.
 */
export interface Section {
  /** Position in document order */
  index: number;
  /** Raw text including line terminators */
  content: string;
}

/**
 * A single chunk submitted as one generation request
 */
export interface Chunk {
  /** Position among all chunks of the document */
  index: number;
  /** Section this chunk was cut from */
  sectionIndex: number;
  /** The chunk content */
  content: string;
  /** Token count estimate */
  tokenEstimate: number;
  /** Tokens shared with the previous chunk of the same section (0 for the first) */
  overlapPrevious: number;
  /** True when the section exceeded the budget and was windowed */
  split: boolean;
}

/**
 * Segmentation settings
 */
export interface SegmenterConfig {
  /** Maximum estimated tokens per chunk */
  tokenBudget: number;
  /** Tokens shared by adjacent windows of a split section; must be below tokenBudget */
  overlapTokens: number;
}

/**
 * Chunking statistics
 */
export interface SegmentationStats {
  totalSections: number;
  totalChunks: number;
  splitSections: number;
  maxChunkTokens: number;
  totalTokens: number;
}

/**
 * Result of segmenting a document body
 */
export interface SegmentationResult {
  sections: Section[];
  chunks: Chunk[];
  stats: SegmentationStats;
}

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  tokenBudget: 8000,
  overlapTokens: 200,
};

/**
 * Characters per token used when no exact tokenizer is available
 */
export const CHARS_PER_TOKEN = 4;
