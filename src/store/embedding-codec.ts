/**
 * Embedding BLOB codec.
 *
 * Vectors are stored as little-endian Float64 so that a stored record reads
 * back with exactly the numbers it was written with.
 */

export const BYTES_PER_ELEMENT = 8;

export function encodeEmbedding(embedding: readonly number[]): Buffer {
  const buf = Buffer.allocUnsafe(embedding.length * BYTES_PER_ELEMENT);
  for (let i = 0; i < embedding.length; i++) {
    buf.writeDoubleLE(embedding[i], i * BYTES_PER_ELEMENT);
  }
  return buf;
}

/**
 * Decode a BLOB into a number array.
 * Returns null when the byte length does not describe `dimension` elements.
 */
export function decodeEmbedding(blob: Buffer, dimension: number): number[] | null {
  if (blob.length !== dimension * BYTES_PER_ELEMENT) {
    return null;
  }
  // Read through the Buffer API: SQLite blobs are not guaranteed 8-byte aligned
  const out = new Array<number>(dimension);
  for (let i = 0; i < dimension; i++) {
    out[i] = blob.readDoubleLE(i * BYTES_PER_ELEMENT);
  }
  return out;
}
