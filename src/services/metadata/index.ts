export { MetadataSynthesizer, parseTags } from './metadata-synthesizer.js';
export type { DocumentMetadata, MetadataSynthesizerOptions } from './metadata-synthesizer.js';
export { buildTagsPrompt, buildDescriptionPrompt } from './prompts.js';
