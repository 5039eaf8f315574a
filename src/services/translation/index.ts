export { ChunkTranslator, joinTranslated, withSourceWhitespace } from './chunk-translator.js';
export type { TranslatedChunk, ChunkTranslatorOptions } from './chunk-translator.js';
export { buildTitlePrompt, buildTranslationPrompt } from './prompts.js';
