/**
 * Generation Client Types
 */

/**
 * What a request is for. Carried into logs and error context only.
 */
export type GenerationTask =
  | 'title'
  | 'translate'
  | 'summarize-chunk'
  | 'summarize-final'
  | 'tags'
  | 'description';

export interface GenerationRequest {
  /** Single user-role prompt */
  prompt: string;
  /** Sampling temperature (0-2) */
  temperature: number;
  task: GenerationTask;
}

/**
 * Synchronous text completion: one prompt in, generated text out, or a thrown error.
 */
export interface GenerationClient {
  complete(request: GenerationRequest): Promise<string>;
  getModel(): string;
}

export interface GenerationClientConfig {
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  /** Log prompts and responses at debug level */
  debug?: boolean;
}
