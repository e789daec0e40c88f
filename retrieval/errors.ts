export type RetrievalErrorCode =
  | 'EMBEDDING_FAILED'
  | 'INDEX_NOT_LOADED'
  | 'INVALID_CONFIG'
  | 'CORRUPT_BUNDLE'
  | 'EMPTY_QUERY'
  | 'INVALID_ARGUMENT'
  | 'DIMENSION_MISMATCH';

/**
 * Base class for every failure the retrieval engine reports to its callers.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class RetrievalError extends Error {
  readonly code: RetrievalErrorCode;

  constructor(code: RetrievalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmbeddingError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_FAILED', message, options);
  }
}

export class NotLoadedError extends RetrievalError {
  constructor(message = 'Vector index is not loaded') {
    super('INDEX_NOT_LOADED', message);
  }
}

export class ConfigError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
  }
}

export class CorruptionError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORRUPT_BUNDLE', message, options);
  }
}

export class EmptyQueryError extends RetrievalError {
  constructor(message = 'Query text cannot be empty') {
    super('EMPTY_QUERY', message);
  }
}

export class InvalidArgumentError extends RetrievalError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class DimensionMismatchError extends RetrievalError {
  constructor(expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `Vector dimension mismatch: expected ${expected}, got ${actual}`);
  }
}

export function assertQueryText(query: string): string {
  if (typeof query !== 'string' || !query.trim()) {
    throw new EmptyQueryError();
  }
  return query.trim();
}

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 0) {
    throw new InvalidArgumentError(`k must be a non-negative integer, got ${k}`);
  }
}

export function assertThreshold(value: number, name = 'threshold'): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(`${name} must be between 0 and 1, got ${value}`);
  }
}
