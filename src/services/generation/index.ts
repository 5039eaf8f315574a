export { OpenAIGenerationClient, createGenerationClient, isRetryableGenerationError } from './openai.client.js';
export type {
  GenerationClient,
  GenerationClientConfig,
  GenerationRequest,
  GenerationTask,
} from './types.js';
