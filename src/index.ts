// Library entry point for md-digest.
// The CLI lives in ./cli.ts; importing this module does not load .env.

export { config, buildConfig, assertValidConfig, collectConfigIssues } from './config/index.js';
export type { Config, TokenizerKind } from './config/index.js';

export { MdDigestError, GenerationError, FileSystemError, ErrorCodes } from './core/errors.js';
export type { ErrorCode } from './core/errors.js';

export {
  CharEstimator,
  TiktokenEstimator,
  createTokenEstimator,
  MarkdownSegmenter,
  createMarkdownSegmenter,
  splitSections,
} from './services/chunking/index.js';
export type {
  Chunk,
  Section,
  SegmentationResult,
  SegmenterConfig,
  TokenEstimator,
} from './services/chunking/index.js';

export { OpenAIGenerationClient, createGenerationClient } from './services/generation/index.js';
export type {
  GenerationClient,
  GenerationClientConfig,
  GenerationRequest,
  GenerationTask,
} from './services/generation/index.js';

export { ChunkTranslator, joinTranslated } from './services/translation/index.js';
export type { TranslatedChunk } from './services/translation/index.js';

export { HierarchicalSummarizer, truncateToChars } from './services/summarization/index.js';
export type { HierarchicalSummary } from './services/summarization/index.js';

export { MetadataSynthesizer, parseTags } from './services/metadata/index.js';
export type { DocumentMetadata } from './services/metadata/index.js';

export {
  FrontMatterTransformer,
  normalizeDate,
  parseDate,
  serializeFrontMatter,
  splitFrontMatter,
} from './services/front-matter/index.js';
export type { FrontMatter, MarkdownDocument, TransformedFrontMatter } from './services/front-matter/index.js';

export { assembleDocument } from './services/document/index.js';

export { findSourceDocuments, markAsProcessed, mirrorPath } from './services/file-sync/index.js';

export { DigestPipeline, createDigestPipeline } from './services/pipeline/index.js';
export type { ProcessResult, RunSummary, DocumentFailure } from './services/pipeline/index.js';
