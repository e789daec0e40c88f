import { DimensionMismatchError, InvalidArgumentError } from '../errors';

export interface Neighbor {
  position: number;
  distance: number;
}

export type IndexBackend = 'flat' | 'native';

/**
 * Exact nearest-neighbour index over fixed-width vectors. Position i is the
 * i-th vector ever added; there is no removal.
 */
export interface VectorIndex {
  readonly backend: IndexBackend;
  readonly dimension: number;
  readonly count: number;
  add(vectors: ArrayLike<number>[]): void;
  /** Ascending squared L2 distance, ties broken by lower position. */
  search(query: ArrayLike<number>, k: number): Neighbor[];
  /** Copy of the stored vector at `position`. */
  vectorAt(position: number): Float32Array;
}

export function compareNeighbors(a: Neighbor, b: Neighbor): number {
  if (a.distance !== b.distance) {
    return a.distance < b.distance ? -1 : 1;
  }
  return a.position - b.position;
}

export function validateDimension(dimension: number): void {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new InvalidArgumentError(`Index dimension must be a positive integer, got ${dimension}`);
  }
}

export function validateVector(vector: ArrayLike<number>, dimension: number): void {
  if (!vector.length) {
    throw new InvalidArgumentError('Vector cannot be empty');
  }

  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }

  for (let i = 0; i < vector.length; i += 1) {
    if (!Number.isFinite(vector[i])) {
      throw new InvalidArgumentError('Vector contains invalid values');
    }
  }
}
