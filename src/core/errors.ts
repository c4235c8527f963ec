/**
 * Domain Errors
 *
 * Every failure the core surfaces to its callers has a class here with a
 * stable `code`. The HTTP layer maps each code to a status in
 * `api/middleware/error-handler.ts`; the core itself knows nothing about HTTP.
 *
 * Classification, prompt assembly, response normalization and diagram repair
 * never throw, so none of these originate there.
 */

export const DomainErrorCodes = {
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  DIAGRAM_TOO_LARGE: 'DIAGRAM_TOO_LARGE',
  UNSUPPORTED_UPLOAD_FORMAT: 'UNSUPPORTED_UPLOAD_FORMAT',
  UPLOAD_DECODE_FAILED: 'UPLOAD_DECODE_FAILED',
  RENDER_FAILED: 'RENDER_FAILED',
} as const;

export type DomainErrorCode = (typeof DomainErrorCodes)[keyof typeof DomainErrorCodes];

/**
 * Base class for errors raised by the core. `details` is serialized into the
 * API error envelope as-is.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class SessionNotFoundError extends DomainError {
  readonly code = DomainErrorCodes.SESSION_NOT_FOUND;

  constructor(readonly sessionId: string) {
    super('Session not found. Create one via POST /api/session and reuse its session_id.', {
      sessionId,
    });
  }
}

export class IndexOutOfRangeError extends DomainError {
  readonly code = DomainErrorCodes.INDEX_OUT_OF_RANGE;

  constructor(index: number, length: number) {
    super('QnA index out of range', { index, length });
  }
}

export class DiagramTooLargeError extends DomainError {
  readonly code = DomainErrorCodes.DIAGRAM_TOO_LARGE;

  constructor(size: number, limit: number) {
    super(`Diagram too large: ${size} characters exceeds the ${limit} character limit.`, {
      size,
      limit,
    });
  }
}

export class UnsupportedUploadFormatError extends DomainError {
  readonly code = DomainErrorCodes.UNSUPPORTED_UPLOAD_FORMAT;

  constructor(contentType: string) {
    super(
      `Unsupported file type '${contentType || 'unknown'}'. Upload a .txt, .md or .pdf file.`,
      { contentType }
    );
  }
}

export class UploadDecodeError extends DomainError {
  readonly code = DomainErrorCodes.UPLOAD_DECODE_FAILED;

  constructor(reason: string) {
    super(`Could not read the uploaded file (${reason}). Save it as UTF-8 text or PDF and retry.`);
  }
}

/**
 * Raised once both rendering services have failed. The message carries the
 * fallback's error text; `details` keeps both.
 */
export class RenderServiceError extends DomainError {
  readonly code = DomainErrorCodes.RENDER_FAILED;

  constructor(
    readonly primaryError: Error,
    readonly fallbackError: Error
  ) {
    super(`Diagram rendering failed: ${fallbackError.message}`, {
      primary: primaryError.message,
      fallback: fallbackError.message,
    });
  }
}
