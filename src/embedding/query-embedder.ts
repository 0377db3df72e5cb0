/**
 * QueryEmbedder Interface
 *
 * The collaborator that turns a natural-language query into a vector for
 * text search. ChunkDB never embeds text itself; callers plug in whatever
 * model produced the stored embeddings.
 */

export interface QueryEmbedder {
  /** Model name/identifier */
  readonly modelName: string;
  /** Length of the vectors returned by embed() */
  readonly dimension: number;

  /**
   * Embed a single query string.
   */
  embed(text: string): Promise<ArrayLike<number>>;
}

/**
 * Copy an embedder's output into a plain number array.
 */
export function toVector(values: ArrayLike<number>): number[] {
  return Array.from(values);
}
