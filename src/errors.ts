/**
 * Error factories for ChunkDB.
 *
 * One factory per error code so that messages and details stay uniform
 * across the collection, validator and engine.
 */

import { ChunkDbError } from './types.js';

/**
 * Type guard to check if an error is a ChunkDbError.
 */
export function isChunkDbError(error: unknown): error is ChunkDbError {
  return error instanceof ChunkDbError;
}

/**
 * Create a DIMENSION_MISMATCH error.
 *
 * @param expected - The collection's fixed dimension
 * @param actual - Length of the offending vector
 */
export function dimensionMismatch(expected: number, actual: number): ChunkDbError {
  return new ChunkDbError(
    'DIMENSION_MISMATCH',
    `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
    { expected, actual },
  );
}

/**
 * Create an INVALID_EMBEDDING_VALUE error for a NaN, infinite or non-numeric element.
 */
export function invalidEmbeddingValue(index: number, value: unknown): ChunkDbError {
  return new ChunkDbError(
    'INVALID_EMBEDDING_VALUE',
    `Embedding element ${index} is not a finite number: ${String(value)}`,
    { index, value: String(value) },
  );
}

export function invalidIdentifier(id: unknown): ChunkDbError {
  return new ChunkDbError('INVALID_IDENTIFIER', 'Record id must be a non-empty string', {
    id: typeof id === 'string' ? id : String(id),
  });
}

/**
 * Create an INVALID_ARGUMENT error.
 *
 * @param field - The field that has an invalid value
 * @param value - The invalid value
 * @param reason - Why the value is invalid
 */
export function invalidArgument(field: string, value: unknown, reason: string): ChunkDbError {
  return new ChunkDbError('INVALID_ARGUMENT', `Invalid argument '${field}': ${reason}`, {
    field,
    value,
    reason,
  });
}

export function duplicateId(id: string): ChunkDbError {
  return new ChunkDbError('DUPLICATE_ID', `Record '${id}' already exists`, { id });
}

/**
 * Create a NOT_OPEN error.
 *
 * @param operation - The operation attempted on the closed engine
 */
export function notOpen(operation: string): ChunkDbError {
  return new ChunkDbError('NOT_OPEN', `Cannot ${operation}: engine is closed. Call open() first.`, {
    operation,
  });
}

/**
 * Create a STORAGE_ERROR error.
 *
 * @param path - The file or directory involved
 * @param operation - The operation that failed (open, write, read, ...)
 * @param reason - Short description ("corrupt", "dimension descriptor missing", ...)
 * @param cause - Optional underlying error
 */
export function storageError(
  path: string,
  operation: string,
  reason: string,
  cause?: unknown,
): ChunkDbError {
  const details: Record<string, unknown> = {
    path,
    operation,
    reason,
  };
  if (cause !== undefined) {
    details.cause = cause instanceof Error ? cause.message : String(cause);
  }
  return new ChunkDbError('STORAGE_ERROR', `Storage error during ${operation} on '${path}': ${reason}`, details);
}

/**
 * Run a storage operation, wrapping anything that is not already a
 * ChunkDbError into STORAGE_ERROR.
 */
export function wrapStorage<T>(path: string, operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (isChunkDbError(error)) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw storageError(path, operation, reason, error);
  }
}
