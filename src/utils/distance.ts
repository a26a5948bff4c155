import type { DistanceMetric } from '../interfaces/VecDbClient.js';

export type DistanceFunction = (vec1: number[], vec2: number[]) => number;

function assertSameLength(vec1: number[], vec2: number[]): void {
  if (vec1.length !== vec2.length) {
    throw new Error('Vectors must have same length');
  }
}

export function cosineSimilarity(vec1: number[], vec2: number[]): number {
  assertSameLength(vec1, vec2);

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < vec1.length; i++) {
    const a = vec1[i] || 0;
    const b = vec2[i] || 0;
    dotProduct += a * b;
    normA += a * a;
    normB += b * b;
  }

  normA = Math.sqrt(normA) || 1;
  normB = Math.sqrt(normB) || 1;

  const sim = dotProduct / (normA * normB);
  return Math.max(-1, Math.min(1, sim));
}

/** 1 - cosine similarity, in [0, 2]. */
export function cosineDistance(vec1: number[], vec2: number[]): number {
  return 1 - cosineSimilarity(vec1, vec2);
}

/** Squared euclidean distance (Chroma's "l2" space). */
export function squaredEuclideanDistance(vec1: number[], vec2: number[]): number {
  assertSameLength(vec1, vec2);
  let sum = 0;
  for (let i = 0; i < vec1.length; i++) {
    const d = (vec1[i] || 0) - (vec2[i] || 0);
    sum += d * d;
  }
  return sum;
}

/** 1 - dot product (Chroma's "ip" space). */
export function innerProductDistance(vec1: number[], vec2: number[]): number {
  assertSameLength(vec1, vec2);
  let dot = 0;
  for (let i = 0; i < vec1.length; i++) dot += (vec1[i] || 0) * (vec2[i] || 0);
  return 1 - dot;
}

export function distanceFor(metric: DistanceMetric): DistanceFunction {
  switch (metric) {
    case 'euclidean':
      return squaredEuclideanDistance;
    case 'dot':
      return innerProductDistance;
    case 'cosine':
    default:
      return cosineDistance;
  }
}
