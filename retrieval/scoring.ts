import { DimensionMismatchError } from './errors';

/**
 * Maps a non-negative distance onto (0, 1]. A distance of 0 scores exactly 1;
 * the result never reaches 0, even for an infinite distance.
 */
export function distanceToScore(distance: number): number {
  if (Number.isNaN(distance)) {
    throw new RangeError('Distance cannot be NaN');
  }

  const score = 1 / (1 + Math.max(0, distance));
  return score > 0 ? score : Number.MIN_VALUE;
}

export function squaredL2(vectorA: ArrayLike<number>, vectorB: ArrayLike<number>): number {
  if (vectorA.length !== vectorB.length) {
    throw new DimensionMismatchError(vectorA.length, vectorB.length);
  }

  let sum = 0;
  for (let i = 0; i < vectorA.length; i += 1) {
    const diff = vectorA[i] - vectorB[i];
    sum += diff * diff;
  }
  return sum;
}

export function vectorNorm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i += 1) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

export function normalize(vector: number[]): number[] {
  const norm = vectorNorm(vector);
  if (norm === 0) {
    return vector;
  }
  return vector.map((value) => value / norm);
}
