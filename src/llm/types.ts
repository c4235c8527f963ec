/**
 * Model Client Types
 *
 * A thin provider-neutral surface over the model SDK. Application code only
 * ever sees `ModelClient`; the Anthropic implementation and the offline echo
 * client both satisfy it.
 */

/**
 * A single conversation message. Messages alternate between roles.
 */
export interface ModelMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Everything one completion needs. The caller decides the token budget and
 * sampling per request.
 */
export interface CompletionRequest {
  system: string;
  messages: ModelMessage[];
  maxTokens: number;
  temperature: number;
  topP?: number;
  /** Aborts the underlying HTTP request when fired */
  signal?: AbortSignal;
}

export interface ModelClient {
  /** Provider name reported by /health */
  readonly provider: string;
  /** False for the offline echo client */
  readonly enabled: boolean;
  complete(request: CompletionRequest): Promise<string>;
  /** Yields text deltas in arrival order */
  stream(request: CompletionRequest): AsyncIterable<string>;
}

/**
 * Error types that can occur when calling the model API.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Provider server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'unknown';         // Unexpected error

/**
 * Raised for every failed model call, streaming or not.
 */
export class LLMError extends Error {
  type: LLMErrorType;
  cause?: Error;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message);
    this.name = 'LLMError';
    this.type = type;
    this.cause = cause;
  }
}
