/**
 * VectorIndex Interface
 *
 * Defines the contract for similarity indexes kept by a collection.
 */

/**
 * Result of a vector search.
 */
export interface VectorSearchResult {
  /** Record id */
  id: string;
  /** Mapped similarity score (0-1, higher = better) */
  score: number;
}

/**
 * Interface for vector indexes.
 *
 * An index never owns records: the collection adds and removes vectors as
 * records are written and deleted, and rebuilds the index on open.
 */
export interface VectorIndex {
  /** Vector dimension */
  readonly dimension: number;

  /** Number of vectors in the index */
  readonly size: number;

  /**
   * Add a vector, replacing any vector already stored under `id`.
   */
  add(id: string, vector: readonly number[]): void;

  /**
   * Remove a vector. Returns false if `id` was not indexed.
   */
  remove(id: string): boolean;

  clear(): void;

  /**
   * Search for the most similar vectors.
   * @param query - Query vector of length `dimension`
   * @param topK - Maximum number of results
   * @param accept - Optional candidate filter applied before ranking
   * @returns Results sorted by score descending, ties by ascending id
   */
  search(query: readonly number[], topK: number, accept?: (id: string) => boolean): VectorSearchResult[];
}
