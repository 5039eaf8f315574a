export { splitFrontMatter, serializeFrontMatter } from './front-matter.js';
export { normalizeDate, parseDate, DATE_PARSE_ATTEMPTS } from './date-normalizer.js';
export type { DateParseAttempt, DateParseResult } from './date-normalizer.js';
export { FrontMatterTransformer } from './front-matter-transformer.js';
export type { TransformedFrontMatter, FrontMatterTransformerOptions } from './front-matter-transformer.js';
export type { FrontMatter, MarkdownDocument } from './types.js';
