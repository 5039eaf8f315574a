/**
 * OpenAI-compatible generation client
 *
 * Any chat-completions endpoint works (DeepSeek by default). Retries happen here,
 * at the transport; callers see either text or a GenerationError.
 */

import { OpenAI, APIConnectionError, APIError, RateLimitError } from 'openai';
import { createComponentLogger } from '../../utils/logger.js';
import { withRetry, isRetryableNetworkError } from '../../utils/retry.js';
import {
  ErrorCodes,
  GenerationError,
  createGenerationError,
  createGenerationUnavailableError,
} from '../../core/errors.js';
import type {
  GenerationClient,
  GenerationClientConfig,
  GenerationRequest,
} from './types.js';

const logger = createComponentLogger('generation');

/**
 * SDK errors are classified by type and status: connection failures (timeouts
 * included), 429 and 5xx are transient. Other errors fall back to message matching.
 */
export function isRetryableGenerationError(error: Error): boolean {
  if (error instanceof APIConnectionError || error instanceof RateLimitError) {
    return true;
  }
  if (error instanceof APIError) {
    return error.status !== undefined && error.status >= 500;
  }
  return isRetryableNetworkError(error);
}

export class OpenAIGenerationClient implements GenerationClient {
  private client: OpenAI;
  private model: string;
  private debug: boolean;

  constructor(config: GenerationClientConfig) {
    if (!config.apiKey) {
      throw createGenerationUnavailableError();
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0, // Disable SDK retry - we handle retries with withRetry
    });
    this.model = config.model;
    this.debug = config.debug ?? false;
  }

  getModel(): string {
    return this.model;
  }

  async complete(request: GenerationRequest): Promise<string> {
    const startedAt = Date.now();

    if (this.debug) {
      logger.debug({ task: request.task, prompt: request.prompt }, 'Generation request');
    }

    try {
      const text = await withRetry(() => this.requestOnce(request), {
        retryableErrors: isRetryableGenerationError,
        onRetry: (error, attempt) => {
          logger.warn(
            {
              error: error.message,
              errorName: error.name,
              attempt,
              task: request.task,
              model: this.model,
            },
            'Retrying generation after error'
          );
        },
      });

      logger.debug(
        {
          task: request.task,
          promptChars: request.prompt.length,
          responseChars: text.length,
          durationMs: Date.now() - startedAt,
          ...(this.debug ? { response: text } : {}),
        },
        'Generation complete'
      );

      return text;
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw createGenerationError(request.task, error instanceof Error ? error.message : String(error), {
        model: this.model,
      });
    }
  }

  private async requestOnce(request: GenerationRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: request.prompt }],
      temperature: request.temperature,
      stream: false,
    });

    if (!response.choices || response.choices.length === 0) {
      throw createGenerationError(
        request.task,
        'empty choices array - model may have refused to respond',
        { model: this.model },
        ErrorCodes.GENERATION_EMPTY
      );
    }
    const content = response.choices[0]?.message?.content;
    if (!content || content.trim() === '') {
      throw createGenerationError(
        request.task,
        'no content in message',
        { model: this.model },
        ErrorCodes.GENERATION_EMPTY
      );
    }

    return content.trim();
  }
}

/**
 * Create the generation client from config values
 */
export function createGenerationClient(config: GenerationClientConfig): GenerationClient {
  return new OpenAIGenerationClient(config);
}
