export { HierarchicalSummarizer, truncateToChars } from './hierarchical-summarizer.js';
export type { HierarchicalSummary, SummarizerOptions } from './hierarchical-summarizer.js';
export { buildChunkSummaryPrompt, buildFinalSummaryPrompt } from './prompts.js';
