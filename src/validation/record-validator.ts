/**
 * Record Validator
 *
 * Pure structural checks run before a record reaches storage. The same
 * functions are used for single inserts and for every record of a batch.
 */

import {
  dimensionMismatch,
  invalidArgument,
  invalidEmbeddingValue,
  invalidIdentifier,
} from '../errors.js';
import type { ChunkDbError, RecordInput } from '../types.js';

export interface ValidationPolicy {
  /** Fixed collection dimension */
  dimension: number;
  /** Treat empty text as invalid */
  rejectEmptyText: boolean;
}

function isScalar(value: unknown): boolean {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return false;
  }
}

/**
 * Check a vector's shape and values against the collection dimension.
 */
export function validateQueryVector(vector: unknown, dimension: number): ChunkDbError | null {
  if (!Array.isArray(vector)) {
    return invalidArgument('embedding', vector, 'Must be an array of numbers');
  }
  if (vector.length !== dimension) {
    return dimensionMismatch(dimension, vector.length);
  }
  for (let i = 0; i < vector.length; i++) {
    const value: unknown = vector[i];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return invalidEmbeddingValue(i, value);
    }
  }
  return null;
}

/**
 * Validate a record. Returns the first failure, or null if the record is valid.
 *
 * Order: record shape, id, embedding (shape, dimension, values), text, then the optional
 * string fields and metadata.
 */
export function validateRecord(input: RecordInput, policy: ValidationPolicy): ChunkDbError | null {
  const candidate: unknown = input;
  if (typeof candidate !== 'object' || candidate === null || Array.isArray(candidate)) {
    return invalidArgument('record', candidate, 'Must be a record object');
  }
  if (typeof input.id !== 'string' || input.id.trim().length === 0) {
    return invalidIdentifier(input.id);
  }

  const embeddingError = validateQueryVector(input.embedding, policy.dimension);
  if (embeddingError) {
    return embeddingError;
  }

  if (typeof input.text !== 'string') {
    return invalidArgument('text', input.text, 'Must be a string');
  }
  if (policy.rejectEmptyText && input.text.length === 0) {
    return invalidArgument('text', input.text, 'Text cannot be empty');
  }

  if (input.sourceReference !== undefined && typeof input.sourceReference !== 'string') {
    return invalidArgument('sourceReference', input.sourceReference, 'Must be a string');
  }
  if (input.embeddingModelId !== undefined && typeof input.embeddingModelId !== 'string') {
    return invalidArgument('embeddingModelId', input.embeddingModelId, 'Must be a string');
  }

  if (input.metadata !== undefined) {
    const metadata: unknown = input.metadata;
    if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata)) {
      return invalidArgument('metadata', metadata, 'Must be a plain object');
    }
    for (const [key, value] of Object.entries(metadata)) {
      if (!isScalar(value)) {
        return invalidArgument(
          `metadata.${key}`,
          value,
          'Must be a string, finite number, boolean or null',
        );
      }
    }
  }

  return null;
}

/**
 * Like validateRecord, but throws the failure.
 */
export function assertValidRecord(input: RecordInput, policy: ValidationPolicy): void {
  const error = validateRecord(input, policy);
  if (error) {
    throw error;
  }
}

/**
 * topK must be a positive integer, optionally bounded above.
 */
export function validateTopK(topK: unknown, maxTopK?: number): ChunkDbError | null {
  if (typeof topK !== 'number' || !Number.isInteger(topK) || topK <= 0) {
    return invalidArgument('topK', topK, 'Must be a positive integer');
  }
  if (maxTopK !== undefined && topK > maxTopK) {
    return invalidArgument('topK', topK, `Must not exceed ${maxTopK}`);
  }
  return null;
}
