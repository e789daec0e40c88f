import type { Logger } from '../../observability/logger';
import { FlatL2Index } from './flat-l2-index';
import { NativeFlatIndex, type NativeIndexProvider } from './native-flat-index';
import type { VectorIndex } from './vector-index';

export interface CreateVectorIndexOptions {
  native?: NativeIndexProvider;
  logger?: Logger;
}

/**
 * Picks the index backend once: the native provider when one is supplied and
 * reports itself available, the in-process flat index otherwise.
 */
export function createVectorIndex(dimension: number, options: CreateVectorIndexOptions = {}): VectorIndex {
  if (options.native?.isAvailable()) {
    options.logger?.debug('Using native vector index backend', { provider: options.native.name, dimension });
    return new NativeFlatIndex(dimension, options.native);
  }

  options.logger?.debug('Using flat vector index backend', { dimension });
  return new FlatL2Index(dimension);
}

export { FlatL2Index } from './flat-l2-index';
export { NativeFlatIndex } from './native-flat-index';
export type { NativeFlatL2, NativeIndexProvider } from './native-flat-index';
export { compareNeighbors } from './vector-index';
export type { IndexBackend, Neighbor, VectorIndex } from './vector-index';
