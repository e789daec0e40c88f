import { z } from 'zod';
import { ConfigError, EmbeddingError } from '../errors';
import { DEFAULT_BATCH_SIZE, encodeInBatches, type Embedder } from './embedder';

export const REMOTE_MODEL_PREFIX = 'openai:';

export interface RemoteEmbedderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Expected width; when omitted it is taken from the first response. */
  dimension?: number;
  headers?: Record<string, string>;
}

const embeddingsResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number().int().nonnegative().optional(),
    embedding: z.array(z.number())
  }))
});

/**
 * Embedder backed by an OpenAI-compatible `/embeddings` endpoint.
 */
export class RemoteEmbedder implements Embedder {
  readonly modelName: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private knownDimension?: number;

  constructor(options: RemoteEmbedderOptions) {
    if (!options.apiKey) {
      throw new ConfigError('Remote embedder API key required');
    }
    if (!options.model) {
      throw new ConfigError('Remote embedder model required');
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.modelName = `${REMOTE_MODEL_PREFIX}${options.model}`;
    this.baseUrl = trimSlash(options.baseUrl ?? 'https://api.openai.com/v1');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.headers = options.headers ?? {};
    this.knownDimension = options.dimension;
  }

  get dimension(): number | undefined {
    return this.knownDimension;
  }

  async encode(texts: string[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<number[][]> {
    const vectors = await encodeInBatches(
      texts,
      batchSize,
      (batch) => this.request(batch),
      this.knownDimension
    );
    const first = vectors[0];
    if (this.knownDimension === undefined && first) {
      this.knownDimension = first.length;
    }
    return vectors;
  }

  private async request(batch: string[]): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetchWithTimeout(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          ...this.headers
        },
        body: JSON.stringify({ model: this.model, input: batch })
      }, this.timeoutMs);
    } catch (error) {
      throw new EmbeddingError(`Embedding model ${this.modelName} is unavailable`, { cause: error });
    }

    if (!response.ok) {
      throw new EmbeddingError(`Embedding API error: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingError('Embedding response is malformed', { cause: error });
    }

    const parsed = embeddingsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError('Embedding response is malformed');
    }

    return parsed.data.data
      .map((row, position) => ({ index: row.index ?? position, embedding: row.embedding }))
      .sort((a, b) => a.index - b.index)
      .map(({ embedding }) => embedding);
  }
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
