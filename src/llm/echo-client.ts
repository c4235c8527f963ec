/**
 * Offline model client. Used when no API key is configured: every answer is
 * the question itself, so the full pipeline still runs end to end.
 */

import type { CompletionRequest, ModelClient } from './types';

export class EchoModelClient implements ModelClient {
  readonly provider = 'echo';
  readonly enabled = false;

  async complete(request: CompletionRequest): Promise<string> {
    return lastUserMessage(request);
  }

  async *stream(request: CompletionRequest): AsyncGenerator<string> {
    // Word-sized chunks, whitespace kept with the word before it
    for (const chunk of lastUserMessage(request).match(/\S+\s*|\s+/g) ?? []) {
      if (request.signal?.aborted) return;
      yield chunk;
    }
  }
}

function lastUserMessage(request: CompletionRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    const message = request.messages[i];
    if (message && message.role === 'user') {
      return message.content;
    }
  }
  return '';
}
