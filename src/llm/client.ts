/**
 * Anthropic Client Wrapper
 *
 * Implements `ModelClient` over the Anthropic SDK. It handles:
 * - Non-streaming and streaming message calls
 * - Per-request token budget, temperature and top_p
 * - Mapping SDK failures to typed `LLMError`s
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: 'test-secret', model: 'claude-sonnet-4-5-20250929' });
 * const text = await client.complete({
 *   system: 'You are concise.',
 *   messages: [{ role: 'user', content: 'What is a B-tree?' }],
 *   maxTokens: 300,
 *   temperature: 0.4,
 * });
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { MessageCreateParamsBase, MessageParam } from '@anthropic-ai/sdk/resources/messages';
import type { CompletionRequest, ModelClient, ModelMessage } from './types';
import { LLMError, type LLMErrorType } from './types';

export interface AnthropicClientOptions {
  apiKey: string;
  model: string;
  /** SDK request timeout */
  timeoutMs?: number;
}

export class AnthropicClient implements ModelClient {
  readonly provider = 'anthropic';
  readonly enabled = true;

  private client: Anthropic;
  private model: string;

  constructor(options: AnthropicClientOptions) {
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs });
    this.model = options.model;
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const response = await this.client.messages.create(
        { ...this.buildParams(request), stream: false },
        { signal: request.signal }
      );
      return this.extractText(response.content);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  async *stream(request: CompletionRequest): AsyncGenerator<string> {
    try {
      const stream = await this.client.messages.create(
        { ...this.buildParams(request), stream: true },
        { signal: request.signal }
      );

      for await (const event of stream) {
        // Only text deltas carry answer text
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private buildParams(request: CompletionRequest): MessageCreateParamsBase {
    return {
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      ...(request.topP !== undefined ? { top_p: request.topP } : {}),
      system: request.system,
      messages: this.formatMessages(request.messages),
    };
  }

  private formatMessages(messages: ModelMessage[]): MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an SDK error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    // Timeout extends APIConnectionError, so check it first
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to the model API timed out. Please try again.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to the model API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
