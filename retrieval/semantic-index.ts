import type { Logger } from '../observability/logger';
import { DEFAULT_BATCH_SIZE, type Embedder } from './embedding/embedder';
import { assertQueryText, assertTopK, ConfigError, CorruptionError, EmbeddingError } from './errors';
import { MetadataStore } from './metadata-store';
import { distanceToScore } from './scoring';
import type { IndexConfig, IntentRecord, SearchHit } from './types';
import { createVectorIndex } from './vector';
import type { NativeIndexProvider } from './vector/native-flat-index';
import type { VectorIndex } from './vector/vector-index';

export interface SemanticIndexParts {
  embedder: Embedder;
  index: VectorIndex;
  metadata: MetadataStore;
}

/**
 * An embedder, a vector index and the records aligned with it. Construction
 * checks the alignment; nothing mutates the parts afterwards.
 */
export class SemanticIndex {
  readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly metadata: MetadataStore;

  constructor(parts: SemanticIndexParts) {
    if (parts.index.count !== parts.metadata.size) {
      throw new CorruptionError(
        `Index holds ${parts.index.count} vectors but metadata holds ${parts.metadata.size} records`
      );
    }
    if (parts.embedder.dimension !== undefined && parts.embedder.dimension !== parts.index.dimension) {
      throw new ConfigError(
        `Embedder ${parts.embedder.modelName} produces ${parts.embedder.dimension}-d vectors but the index is ${parts.index.dimension}-d`
      );
    }
    this.embedder = parts.embedder;
    this.index = parts.index;
    this.metadata = parts.metadata;
  }

  get config(): IndexConfig {
    return {
      modelName: this.embedder.modelName,
      dimension: this.index.dimension,
      totalVectors: this.index.count
    };
  }

  get vectorIndex(): VectorIndex {
    return this.index;
  }

  get records(): IntentRecord[] {
    return this.metadata.toArray();
  }

  async search(query: string, k: number): Promise<SearchHit[]> {
    const text = assertQueryText(query);
    assertTopK(k);
    if (k === 0 || this.index.count === 0) {
      return [];
    }

    const [vector] = await this.embedder.encode([text], 1);
    if (!vector) {
      throw new EmbeddingError('Embedder returned no vector for the query');
    }

    return this.index.search(vector, k).map((neighbor, position) => ({
      rank: position + 1,
      record: this.metadata.get(neighbor.position),
      distance: neighbor.distance,
      score: distanceToScore(neighbor.distance)
    }));
  }
}

export interface BuildSemanticIndexOptions {
  batchSize?: number;
  native?: NativeIndexProvider;
  logger?: Logger;
}

/**
 * Validates the records, embeds their texts in batches and returns a ready
 * index. Nothing is shared with any previously built index.
 */
export async function buildSemanticIndex(
  records: readonly unknown[],
  embedder: Embedder,
  options: BuildSemanticIndexOptions = {}
): Promise<SemanticIndex> {
  const metadata = new MetadataStore(records);
  const texts = metadata.toArray().map((record) => record.text);
  const startedAt = Date.now();

  options.logger?.info('Encoding records', { count: texts.length, model: embedder.modelName });
  const vectors = await embedder.encode(texts, options.batchSize ?? DEFAULT_BATCH_SIZE);

  const dimension = embedder.dimension ?? vectors[0]?.length;
  if (dimension === undefined) {
    throw new ConfigError(`Cannot build an empty index: ${embedder.modelName} does not declare its dimension`);
  }

  const index = createVectorIndex(dimension, { native: options.native, logger: options.logger });
  index.add(vectors);

  const built = new SemanticIndex({ embedder, index, metadata });
  options.logger?.info('Built semantic index', {
    totalVectors: index.count,
    dimension,
    backend: index.backend,
    durationMs: Date.now() - startedAt
  });
  return built;
}
