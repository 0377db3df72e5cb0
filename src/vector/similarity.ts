/**
 * Vector math and score mapping.
 */

import type { ScoreMapping } from '../types.js';

export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function l2Norm(vector: readonly number[]): number {
  let sumSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumSquares += vector[i] * vector[i];
  }
  return Math.sqrt(sumSquares);
}

/**
 * L2 normalize a vector to unit length. Returns null for the zero vector.
 *
 * Components are first divided by the largest magnitude so that squaring
 * neither overflows (1e200) nor underflows (1e-170) for any finite input.
 * After normalization, cosine similarity = dot product.
 */
export function unitVector(vector: readonly number[]): number[] | null {
  let maxAbs = 0;
  for (let i = 0; i < vector.length; i++) {
    maxAbs = Math.max(maxAbs, Math.abs(vector[i]));
  }
  if (maxAbs === 0 || !Number.isFinite(maxAbs)) {
    return null;
  }

  const scaled = vector.map((v) => v / maxAbs);
  const norm = l2Norm(scaled);
  return scaled.map((v) => v / norm);
}

/**
 * Cosine similarity of two unit vectors (as returned by unitVector).
 * A zero vector has similarity 0 with everything.
 */
export function cosineOfUnits(a: readonly number[] | null, b: readonly number[] | null): number {
  if (!a || !b) {
    return 0;
  }
  return dot(a, b);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  return cosineOfUnits(unitVector(a), unitVector(b));
}

/**
 * Map raw cosine similarity (-1..1) to a score in 0..1.
 *
 * - clamp: negative similarity becomes 0
 * - shift: (cos + 1) / 2
 *
 * Rounding can push |cos| slightly past 1, so both mappings clamp the result.
 * NaN maps to 0.
 */
export function toScore(cosine: number, mapping: ScoreMapping): number {
  if (Number.isNaN(cosine)) {
    return 0;
  }
  const raw = mapping === 'shift' ? (cosine + 1) / 2 : cosine;
  return Math.min(1, Math.max(0, raw));
}

export interface Scored {
  id: string;
  score: number;
}

/**
 * Order by score descending, then by id ascending (code-unit order, not locale).
 */
export function compareScored(a: Scored, b: Scored): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
