import {
  EmbeddingError,
  EmptyQueryError,
  InvalidArgumentError,
  NotLoadedError,
  type RetrievalError
} from '../retrieval/errors';

/**
 * Client mistakes map to 400 and a missing index to 503. Embedding backend
 * failures are 502; config, corruption and dimension errors are 500.
 */
export function httpStatusFor(error: RetrievalError): number {
  if (error instanceof EmptyQueryError || error instanceof InvalidArgumentError) {
    return 400;
  }
  if (error instanceof NotLoadedError) {
    return 503;
  }
  if (error instanceof EmbeddingError) {
    return 502;
  }
  return 500;
}
