/**
 * API Response Types and Request Schemas
 *
 * Every JSON endpoint answers with one of two shapes:
 * 1. ApiResponse<T> - `{ success: true, data }`
 * 2. ApiErrorResponse - `{ success: false, error: { code, message, details? } }`
 *
 * Request bodies are validated with the zod schemas below through the
 * `validate(schema)` middleware.
 *
 * @example
 * ```typescript
 * const ok: ApiResponse<{ sessionId: string }> = {
 *   success: true,
 *   data: { sessionId: '5f0c...' },
 * };
 *
 * const failed: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'SESSION_NOT_FOUND', message: 'Session not found. ...' },
 * };
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR', 'SESSION_NOT_FOUND' */
  code: string;
  message: string;
  /** Field-level detail for validation failures, context for others */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const sessionIdField = z.string().trim().min(1, 'sessionId is required');

/**
 * POST /api/question
 *
 * Style fields are free-form strings; unknown modes, tones and layouts fall
 * back to their defaults during prompt assembly.
 */
export const questionSchema = z.object({
  sessionId: sessionIdField,
  question: z.string().trim().min(1, 'question is required'),
  systemPrompt: z.string().nullish(),
  stream: z.boolean().optional().default(false),
  styleMode: z.string().optional(),
  tone: z.string().optional(),
  layout: z.string().optional(),
  variability: z.number().min(0).max(1).optional(),
  seed: z.number().int().optional(),
});

export type QuestionRequest = z.infer<typeof questionSchema>;

/** POST /api/session/:id/transcript */
export const transcriptChunkSchema = z.object({
  text: z.string(),
});

/** POST /api/evaluate; blank code is rejected by the handler with BAD_REQUEST */
export const evaluateSchema = z.object({
  sessionId: sessionIdField,
  problem: z.string().nullish(),
  code: z.string(),
  language: z.string().optional(),
});

export type EvaluateRequest = z.infer<typeof evaluateSchema>;

/** Body of POST /api/render_mermaid and POST /api/diagrams/repair */
export const diagramSchema = z.object({
  code: z.string(),
  theme: z.string().optional(),
  stylePreset: z.string().optional(),
});

export type DiagramRequest = z.infer<typeof diagramSchema>;

/** Query of GET /api/render_mermaid */
export const diagramQuerySchema = z.object({
  code: z.string().optional().default(''),
  theme: z.string().optional(),
  stylePreset: z.string().optional(),
});
