/**
 * Defines custom error types for the newsdex pipeline.
 */

/**
 * Base class for all newsdex specific errors.
 * Carries a stable errorCode and optional structured details.
 */
export class NewsdexError extends Error {
  public errorCode: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Fetch Errors ---

/**
 * Classification of a failed fetch
 */
export type FetchErrorKind =
  | 'Timeout'
  | 'ConnectionReset'
  | 'ProtocolError'
  | 'NotFound'
  | 'Cancelled'
  | 'Other';

export class FetchError extends NewsdexError {
  public readonly kind: FetchErrorKind;
  public readonly link: string;
  public readonly attempts: number;
  public readonly elapsedMs: number;
  public readonly statusCode?: number;

  constructor(
    kind: FetchErrorKind,
    link: string,
    attempts: number,
    elapsedMs: number,
    options: { statusCode?: number; cause?: string } = {}
  ) {
    super(
      `Fetch failed (${kind}) for ${link} after ${attempts} attempt(s)${options.cause ? `: ${options.cause}` : ''}`,
      'FETCH_FAILED',
      { kind, link, attempts, elapsedMs, statusCode: options.statusCode, cause: options.cause }
    );
    this.kind = kind;
    this.link = link;
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    this.statusCode = options.statusCode;
  }
}

// --- Extraction Errors ---

export type ExtractionFailureReason = 'missing-body' | 'not-html' | 'unexpected-status' | 'unparseable';

export class ExtractionError extends NewsdexError {
  public readonly reason: ExtractionFailureReason;
  public readonly link: string;

  constructor(reason: ExtractionFailureReason, link: string, details?: Record<string, unknown>) {
    super(`Extraction failed (${reason}) for ${link}`, 'EXTRACTION_FAILED', { reason, link, ...details });
    this.reason = reason;
    this.link = link;
  }
}

// --- Store Errors ---

/**
 * Raised inside a store transaction when the decision it was given no longer
 * matches the stored state (another ingestion got there first).
 */
export class ResolutionConflictError extends NewsdexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Resolution conflict: ${message}`, 'RESOLUTION_CONFLICT', details);
  }
}

export class StoreError extends NewsdexError {
  public readonly retryable: boolean;

  constructor(message: string, options: { retryable?: boolean; originalError?: Error; details?: Record<string, unknown> } = {}) {
    super(
      `Store error: ${message}${options.originalError ? `. ${options.originalError.message}` : ''}`,
      'STORE_ERROR',
      { ...options.details, originalError: options.originalError?.message }
    );
    this.retryable = options.retryable ?? true;
  }
}

export class ArticleNotFoundError extends NewsdexError {
  constructor(articleId: number, details?: Record<string, unknown>) {
    super(`Article '${articleId}' not found.`, 'ARTICLE_NOT_FOUND', { articleId, ...details });
  }
}

// --- Similarity Index Errors ---

export class IndexError extends NewsdexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Similarity index error: ${message}`, 'INDEX_ERROR', details);
  }
}

// --- Validation Errors ---

export class ValidationError extends NewsdexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, 'VALIDATION_ERROR', details);
  }
}

// --- Configuration Errors ---

export class ConfigurationError extends NewsdexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

// --- Crawl Control Errors ---

export class CrawlStateError extends NewsdexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Crawl state error: ${message}`, 'CRAWL_STATE_ERROR', details);
  }
}

export function isNewsdexError(error: unknown): error is NewsdexError {
  return error instanceof NewsdexError;
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
