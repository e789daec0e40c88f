import { ConfigError, EmbeddingError } from '../errors';
import type { Embedder } from './embedder';
import { HASHING_MODEL_PREFIX, HashingEmbedder } from './hashing-embedder';
import { REMOTE_MODEL_PREFIX, RemoteEmbedder } from './remote-embedder';

export type EmbedderFactory = (modelName: string) => Embedder;

/**
 * Resolves a model identifier to a fresh embedder. Factories are matched by
 * identifier prefix; the most recently registered match wins.
 */
export class EmbedderRegistry {
  private readonly factories: Array<{ prefix: string; factory: EmbedderFactory }> = [];

  register(prefix: string, factory: EmbedderFactory): this {
    if (!prefix) {
      throw new ConfigError('Embedder prefix must be non-empty');
    }
    this.factories.unshift({ prefix, factory });
    return this;
  }

  has(modelName: string): boolean {
    return this.factories.some(({ prefix }) => modelName.startsWith(prefix));
  }

  resolve(modelName: string): Embedder {
    if (!modelName) {
      throw new ConfigError('Embedding model identifier is required');
    }

    const entry = this.factories.find(({ prefix }) => modelName.startsWith(prefix));
    if (!entry) {
      throw new ConfigError(`Unknown embedding model: ${modelName}`);
    }

    const embedder = entry.factory(modelName);
    if (embedder.modelName !== modelName) {
      throw new ConfigError(`Embedder for ${modelName} reports model ${embedder.modelName}`);
    }
    return embedder;
  }
}

export interface DefaultRegistryOptions {
  openai?: {
    apiKey?: string;
    baseUrl?: string;
    headers?: Record<string, string>;
  };
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): EmbedderRegistry {
  return new EmbedderRegistry()
    .register(HASHING_MODEL_PREFIX, (modelName) => HashingEmbedder.fromModelName(modelName))
    .register(REMOTE_MODEL_PREFIX, (modelName) => {
      const apiKey = options.openai?.apiKey;
      if (!apiKey) {
        throw new EmbeddingError(`Embedding model ${modelName} is unavailable: OPENAI_API_KEY is not set`);
      }
      return new RemoteEmbedder({
        apiKey,
        model: modelName.slice(REMOTE_MODEL_PREFIX.length),
        baseUrl: options.openai?.baseUrl,
        headers: options.openai?.headers
      });
    });
}
