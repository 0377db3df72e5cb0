/**
 * FlatVectorIndex
 *
 * Exhaustive-scan cosine index. Every query is scored against every stored
 * vector, so results are exact. Vectors are normalized once at insertion.
 */

import type { ScoreMapping } from '../types.js';
import type { VectorIndex, VectorSearchResult } from './vector-index.js';
import { compareScored, cosineOfUnits, toScore, unitVector } from './similarity.js';

interface IndexedVector {
  /** null for the zero vector */
  unit: readonly number[] | null;
}

export class FlatVectorIndex implements VectorIndex {
  private entries: Map<string, IndexedVector> = new Map();

  constructor(
    readonly dimension: number,
    private readonly mapping: ScoreMapping = 'clamp',
  ) {}

  get size(): number {
    return this.entries.size;
  }

  add(id: string, vector: readonly number[]): void {
    if (vector.length !== this.dimension) {
      throw new Error(`Vector dimension (${vector.length}) must be ${this.dimension}`);
    }
    this.entries.set(id, { unit: unitVector(vector) });
  }

  remove(id: string): boolean {
    return this.entries.delete(id);
  }

  clear(): void {
    this.entries.clear();
  }

  search(query: readonly number[], topK: number, accept?: (id: string) => boolean): VectorSearchResult[] {
    if (query.length !== this.dimension) {
      throw new Error(`Query dimension (${query.length}) must be ${this.dimension}`);
    }
    if (topK <= 0 || this.entries.size === 0) {
      return [];
    }

    const queryUnit = unitVector(query);
    const results: VectorSearchResult[] = [];
    for (const [id, entry] of this.entries) {
      if (accept && !accept(id)) {
        continue;
      }
      const cosine = cosineOfUnits(queryUnit, entry.unit);
      results.push({ id, score: toScore(cosine, this.mapping) });
    }

    results.sort(compareScored);
    return results.length > topK ? results.slice(0, topK) : results;
  }
}
