import { assertTopK, CorruptionError, InvalidArgumentError } from '../errors';
import { compareNeighbors, validateDimension, validateVector, type Neighbor, type VectorIndex } from './vector-index';

/**
 * Minimal surface of a native flat-L2 index (for example a FAISS binding).
 * Vectors are passed row-major and flattened.
 */
export interface NativeFlatL2 {
  add(vectors: number[]): void;
  search(query: number[], k: number): { distances: number[]; labels: number[] };
  ntotal(): number;
  reconstruct(position: number): number[];
}

export interface NativeIndexProvider {
  readonly name: string;
  isAvailable(): boolean;
  create(dimension: number): NativeFlatL2;
}

export class NativeFlatIndex implements VectorIndex {
  readonly backend = 'native' as const;
  private readonly native: NativeFlatL2;

  constructor(readonly dimension: number, provider: NativeIndexProvider) {
    validateDimension(dimension);
    this.native = provider.create(dimension);
  }

  get count(): number {
    return this.native.ntotal();
  }

  add(vectors: ArrayLike<number>[]): void {
    for (const vector of vectors) {
      validateVector(vector, this.dimension);
    }
    if (!vectors.length) {
      return;
    }

    const flat: number[] = [];
    for (const vector of vectors) {
      for (let i = 0; i < vector.length; i += 1) {
        flat.push(vector[i]);
      }
    }
    this.native.add(flat);
  }

  search(query: ArrayLike<number>, k: number): Neighbor[] {
    assertTopK(k);
    const total = this.count;
    if (k === 0 || total === 0) {
      return [];
    }
    validateVector(query, this.dimension);

    const limit = Math.min(k, total);
    const probe = Array.from(query);

    // Ask for one extra row: if it ties with the last kept row the binding's own
    // tie order cannot be trusted, so rank the whole index instead.
    let neighbors = this.collect(probe, Math.min(limit + 1, total));
    const boundary = neighbors[limit - 1];
    const extra = neighbors[limit];
    if (boundary && extra && boundary.distance === extra.distance && neighbors.length < total) {
      neighbors = this.collect(probe, total);
    }

    return neighbors.sort(compareNeighbors).slice(0, limit);
  }

  vectorAt(position: number): Float32Array {
    if (!Number.isInteger(position) || position < 0 || position >= this.count) {
      throw new InvalidArgumentError(`Position ${position} is out of range`);
    }
    const vector = this.native.reconstruct(position);
    if (vector.length !== this.dimension) {
      throw new CorruptionError(`Native index returned a vector of width ${vector.length} at position ${position}`);
    }
    return Float32Array.from(vector);
  }

  private collect(probe: number[], k: number): Neighbor[] {
    const total = this.count;
    const { distances, labels } = this.native.search(probe, k);
    const neighbors: Neighbor[] = [];

    for (let i = 0; i < labels.length; i += 1) {
      const position = labels[i];
      const distance = distances[i];
      // FAISS pads missing results with label -1.
      if (position === undefined || distance === undefined || position < 0) {
        continue;
      }
      if (!Number.isInteger(position) || position >= total) {
        throw new CorruptionError(`Native index returned unknown position ${position}`);
      }
      neighbors.push({ position, distance: Math.max(0, distance) });
    }

    return neighbors;
  }
}
