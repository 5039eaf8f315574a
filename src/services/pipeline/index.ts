export { DigestPipeline, createDigestPipeline } from './digest-pipeline.js';
export type {
  DigestPipelineOptions,
  DocumentFailure,
  ProcessResult,
  RunSummary,
} from './types.js';
