// src/errors.ts
// What: Typed error taxonomy for ingestion, retrieval and generation.
// How: Every error extends AppError, which carries the HTTP status and machine-readable code read by the
//      centralized Express error handler. `kind` is the discriminant callers branch on; the original failure
//      is kept as `cause`.

export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.status = status;
    this.code = code;
  }
}

export type IngestionErrorKind = 'ParseFailure' | 'EmbeddingFailure' | 'StorageFailure' | 'DuplicateFilename';

const INGESTION_STATUS: Record<IngestionErrorKind, number> = {
  ParseFailure: 422,
  EmbeddingFailure: 502,
  StorageFailure: 500,
  DuplicateFilename: 409,
};

export class IngestionError extends AppError {
  readonly kind: IngestionErrorKind;
  /** Set when cleaning up a partially written document failed as well. */
  rollbackError?: unknown;

  constructor(kind: IngestionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, INGESTION_STATUS[kind], kind, options);
    this.name = 'IngestionError';
    this.kind = kind;
  }
}

export type RetrievalErrorKind = 'StoreUnavailable' | 'EmbeddingUnavailable';

export class RetrievalError extends AppError {
  readonly kind: RetrievalErrorKind;

  constructor(kind: RetrievalErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, 502, kind, options);
    this.name = 'RetrievalError';
    this.kind = kind;
  }
}

export type GenerationErrorKind = 'ModelUnavailable' | 'MalformedModelOutput';

export class GenerationError extends AppError {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, 502, kind, options);
    this.name = 'GenerationError';
    this.kind = kind;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NotFound');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'ValidationError');
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
