/**
 * In-process stand-in for the generation service
 */

import type {
  GenerationClient,
  GenerationRequest,
} from '../../src/services/generation/types.js';

export type Responder = (request: GenerationRequest) => string | Promise<string>;

export class FakeGenerationClient implements GenerationClient {
  readonly requests: GenerationRequest[] = [];

  constructor(private responder: Responder = () => 'ok') {}

  async complete(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.responder(request);
  }

  getModel(): string {
    return 'fake-model';
  }

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  tasks(): string[] {
    return this.requests.map((r) => r.task);
  }
}
