/**
 * LLM Module - Barrel Export
 *
 * - AnthropicClient: the production `ModelClient`
 * - EchoModelClient: offline stand-in used without an API key
 * - createModelClient: picks one from configuration
 * - Prompt text for answers and code critiques
 *
 * @example
 * ```typescript
 * import { createModelClient } from './llm';
 *
 * const model = createModelClient(config.anthropic);
 * for await (const chunk of model.stream(request)) {
 *   process.stdout.write(chunk);
 * }
 * ```
 */

import { AnthropicClient } from './client';
import { EchoModelClient } from './echo-client';
import type { ModelClient } from './types';

export { AnthropicClient } from './client';
export type { AnthropicClientOptions } from './client';
export { EchoModelClient } from './echo-client';

export type { ModelMessage, CompletionRequest, ModelClient, LLMErrorType } from './types';
export { LLMError } from './types';

export {
  DEFAULT_SYSTEM_PROMPT,
  PROFILE_CONTEXT_HEADER,
  OVERRIDE_BLOCKS,
  CODE_CRITIQUE_SYSTEM_PROMPT,
  CODE_CRITIQUE_TEMPERATURE,
  CODE_CRITIQUE_MAX_TOKENS,
  OFFLINE_CRITIQUE,
  buildCodeCritiqueUserMessage,
  type CodeCritiqueInput,
} from './prompts';

export interface ModelClientSettings {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

/**
 * Returns the Anthropic client when a key is configured, otherwise the
 * offline echo client.
 */
export function createModelClient(settings: ModelClientSettings): ModelClient {
  if (!settings.apiKey) {
    return new EchoModelClient();
  }
  return new AnthropicClient({
    apiKey: settings.apiKey,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
  });
}
