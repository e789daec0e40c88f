import { ConfigError } from '../errors';
import { normalize } from '../scoring';
import { DEFAULT_BATCH_SIZE, encodeInBatches, type Embedder } from './embedder';

export const HASHING_MODEL_PREFIX = 'hashing-';
export const DEFAULT_HASHING_DIMENSION = 384;

const WORD_WEIGHT = 1;
const BIGRAM_WEIGHT = 0.5;
const TRIGRAM_WEIGHT = 0.35;

/**
 * Local embedder based on signed feature hashing of words, word bigrams and
 * character trigrams. Needs no model download and is fully deterministic.
 */
export class HashingEmbedder implements Embedder {
  readonly modelName: string;

  constructor(readonly dimension: number = DEFAULT_HASHING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ConfigError(`Hashing embedder dimension must be a positive integer, got ${dimension}`);
    }
    this.modelName = `${HASHING_MODEL_PREFIX}${dimension}`;
  }

  static fromModelName(modelName: string): HashingEmbedder {
    const match = /^hashing-(\d+)$/u.exec(modelName);
    if (!match?.[1]) {
      throw new ConfigError(`Not a hashing model identifier: ${modelName}`);
    }
    return new HashingEmbedder(Number(match[1]));
  }

  async encode(texts: string[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<number[][]> {
    return encodeInBatches(
      texts,
      batchSize,
      async (batch) => batch.map((text) => this.embed(text)),
      this.dimension
    );
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const words = tokenize(text);

    words.forEach((word, index) => {
      this.accumulate(vector, `w:${word}`, WORD_WEIGHT);

      const next = words[index + 1];
      if (next !== undefined) {
        this.accumulate(vector, `b:${word} ${next}`, BIGRAM_WEIGHT);
      }

      const padded = `#${word}#`;
      for (let i = 0; i + 3 <= padded.length; i += 1) {
        this.accumulate(vector, `c:${padded.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
      }
    });

    return normalize(vector);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimension;
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[bucket] += sign * weight;
  }
}

export function tokenize(text: string): string[] {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
