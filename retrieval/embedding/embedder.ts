import { EmbeddingError, InvalidArgumentError } from '../errors';

export const DEFAULT_BATCH_SIZE = 32;

/**
 * Deterministic text → vector mapping. The same text under the same
 * `modelName` yields the same vector for the life of the process.
 */
export interface Embedder {
  readonly modelName: string;
  /** Width of every vector, when known before the first call. */
  readonly dimension?: number;
  encode(texts: string[], batchSize?: number): Promise<number[][]>;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/u;

export function assertEncodable(texts: unknown[]): asserts texts is string[] {
  texts.forEach((text, index) => {
    if (typeof text !== 'string') {
      throw new EmbeddingError(`Text at position ${index} is not a string`);
    }
    if (LONE_SURROGATE.test(text)) {
      throw new EmbeddingError(`Text at position ${index} is not valid UTF-16`);
    }
  });
}

/**
 * Runs `encodeBatch` over consecutive slices and checks that every batch
 * returns exactly one finite vector per text, all of the same width.
 */
export async function encodeInBatches(
  texts: string[],
  batchSize: number,
  encodeBatch: (batch: string[]) => Promise<number[][]>,
  expectedDimension?: number
): Promise<number[][]> {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidArgumentError(`Batch size must be a positive integer, got ${batchSize}`);
  }
  assertEncodable(texts);

  const vectors: number[][] = [];
  let dimension = expectedDimension;

  for (let start = 0; start < texts.length; start += batchSize) {
    const batch = texts.slice(start, start + batchSize);
    const encoded = await encodeBatch(batch);

    if (encoded.length !== batch.length) {
      throw new EmbeddingError(`Embedding backend returned ${encoded.length} vectors for ${batch.length} texts`);
    }

    for (const vector of encoded) {
      dimension = dimension ?? vector.length;
      if (vector.length !== dimension || vector.length === 0) {
        throw new EmbeddingError(`Embedding backend returned a vector of width ${vector.length}, expected ${dimension}`);
      }
      if (vector.some((value) => !Number.isFinite(value))) {
        throw new EmbeddingError('Embedding backend returned non-finite values');
      }
      vectors.push(vector);
    }
  }

  return vectors;
}
