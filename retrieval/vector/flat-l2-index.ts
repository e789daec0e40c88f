import { assertTopK, InvalidArgumentError } from '../errors';
import { compareNeighbors, validateDimension, validateVector, type Neighbor, type VectorIndex } from './vector-index';

const INITIAL_CAPACITY = 64;

/**
 * Brute-force squared-L2 index over a single contiguous Float32Array.
 */
export class FlatL2Index implements VectorIndex {
  readonly backend = 'flat' as const;
  private data: Float32Array;
  private size = 0;

  constructor(readonly dimension: number) {
    validateDimension(dimension);
    this.data = new Float32Array(INITIAL_CAPACITY * dimension);
  }

  get count(): number {
    return this.size;
  }

  add(vectors: ArrayLike<number>[]): void {
    // Validate the whole batch first so a bad row leaves the index untouched.
    for (const vector of vectors) {
      validateVector(vector, this.dimension);
    }

    this.ensureCapacity(this.size + vectors.length);
    for (const vector of vectors) {
      this.data.set(vector, this.size * this.dimension);
      this.size += 1;
    }
  }

  search(query: ArrayLike<number>, k: number): Neighbor[] {
    assertTopK(k);
    if (k === 0 || this.size === 0) {
      return [];
    }
    validateVector(query, this.dimension);

    const probe = Float32Array.from(query);
    const neighbors: Neighbor[] = new Array(this.size);
    for (let position = 0; position < this.size; position += 1) {
      const offset = position * this.dimension;
      let distance = 0;
      for (let j = 0; j < this.dimension; j += 1) {
        const diff = this.data[offset + j] - probe[j];
        distance += diff * diff;
      }
      neighbors[position] = { position, distance };
    }

    return neighbors
      .sort(compareNeighbors)
      .slice(0, Math.min(k, this.size));
  }

  vectorAt(position: number): Float32Array {
    if (!Number.isInteger(position) || position < 0 || position >= this.size) {
      throw new InvalidArgumentError(`Position ${position} is out of range`);
    }
    const offset = position * this.dimension;
    return this.data.slice(offset, offset + this.dimension);
  }

  private ensureCapacity(required: number): void {
    const capacity = this.data.length / this.dimension;
    if (required <= capacity) {
      return;
    }

    let next = Math.max(capacity, INITIAL_CAPACITY);
    while (next < required) {
      next *= 2;
    }
    const grown = new Float32Array(next * this.dimension);
    grown.set(this.data.subarray(0, this.size * this.dimension));
    this.data = grown;
  }
}
