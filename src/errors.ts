/**
 * Application error hierarchy.
 * Every error carries a stable code and an HTTP status so the error handler
 * can map it to a structured response. Engine errors additionally map to an
 * EngineErrorKind for the router trace.
 */

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'CONFIGURATION_ERROR'
  | 'MALFORMED_RECORD'
  | 'EMBEDDING_UNAVAILABLE'
  | 'GENERATION_UNAVAILABLE'
  | 'PROVIDER_TIMEOUT'
  | 'QUERY_GENERATION_FAILED'
  | 'GENERATION_FORMAT'
  | 'INSUFFICIENT_EVIDENCE'
  | 'QUERY_CANCELLED'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Transport ──

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, details);
  }
}

// ── Ingestion ──

export class MalformedRecordError extends AppError {
  constructor(
    message: string,
    details: { sourceType: string; field?: string }
  ) {
    super('MALFORMED_RECORD', message, 422, details);
  }
}

// ── Providers ──

export class EmbeddingProviderError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('EMBEDDING_UNAVAILABLE', message, 503);
    this.cause = cause;
  }
}

export class GenerationProviderError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_UNAVAILABLE', message, 503);
    this.cause = cause;
  }
}

export class ProviderTimeoutError extends AppError {
  constructor(readonly timeoutMs: number, context: string) {
    super('PROVIDER_TIMEOUT', `${context} timed out after ${timeoutMs}ms`, 504, {
      timeoutMs,
    });
  }
}

// ── Engines ──

export type QueryGenerationStage =
  | 'generation'
  | 'parse'
  | 'validation'
  | 'execution';

export class QueryGenerationError extends AppError {
  constructor(
    message: string,
    readonly stage: QueryGenerationStage,
    details?: Record<string, unknown>
  ) {
    super('QUERY_GENERATION_FAILED', message, 422, { stage, ...details });
  }
}

export class GenerationFormatError extends AppError {
  constructor(message: string) {
    super('GENERATION_FORMAT', message, 502);
  }
}

export class InsufficientEvidenceError extends AppError {
  constructor(readonly bestSimilarity: number | null, readonly threshold: number) {
    super(
      'INSUFFICIENT_EVIDENCE',
      'Not enough matching personal data to answer this question',
      404,
      { bestSimilarity, threshold }
    );
  }
}

export class QueryCancelledError extends AppError {
  constructor() {
    super('QUERY_CANCELLED', 'Query was cancelled by the caller', 499);
  }
}

// ── Router trace ──

export type EngineErrorKind =
  | 'malformed_record'
  | 'embedding_provider'
  | 'generation_provider'
  | 'provider_timeout'
  | 'query_generation'
  | 'generation_format'
  | 'insufficient_evidence'
  | 'cancelled'
  | 'unknown';

export function errorKindOf(err: unknown): EngineErrorKind {
  if (err instanceof MalformedRecordError) return 'malformed_record';
  if (err instanceof EmbeddingProviderError) return 'embedding_provider';
  if (err instanceof GenerationProviderError) return 'generation_provider';
  if (err instanceof ProviderTimeoutError) return 'provider_timeout';
  if (err instanceof QueryGenerationError) return 'query_generation';
  if (err instanceof GenerationFormatError) return 'generation_format';
  if (err instanceof InsufficientEvidenceError) return 'insufficient_evidence';
  if (err instanceof QueryCancelledError) return 'cancelled';
  return 'unknown';
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
