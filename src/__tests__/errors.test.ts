/**
 * Tests for ChunkDbError class and error utilities.
 */

import { describe, it, expect } from 'vitest';
import { ChunkDbError } from '../types.js';
import {
  dimensionMismatch,
  invalidEmbeddingValue,
  invalidIdentifier,
  invalidArgument,
  duplicateId,
  notOpen,
  storageError,
  isChunkDbError,
  wrapStorage,
} from '../errors.js';

describe('ChunkDbError', () => {
  it('should create error with code and message', () => {
    const error = new ChunkDbError('INVALID_ARGUMENT', 'Invalid topK');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.message).toBe('Invalid topK');
    expect(error.name).toBe('ChunkDbError');
    expect(error.details).toBeUndefined();
  });

  it('should be instanceof Error', () => {
    const error = new ChunkDbError('NOT_OPEN', 'closed');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ChunkDbError);
  });

  describe('isChunkDbError', () => {
    it('should return true for ChunkDbError instances', () => {
      expect(isChunkDbError(new ChunkDbError('NOT_OPEN', 'closed'))).toBe(true);
    });

    it('should return false for other values', () => {
      expect(isChunkDbError(new Error('plain'))).toBe(false);
      expect(isChunkDbError('NOT_OPEN')).toBe(false);
      expect(isChunkDbError(null)).toBe(false);
      expect(isChunkDbError({ code: 'NOT_OPEN', message: 'fake' })).toBe(false);
    });
  });
});

describe('error factories', () => {
  it('dimensionMismatch carries expected and actual', () => {
    const error = dimensionMismatch(4, 3);
    expect(error.code).toBe('DIMENSION_MISMATCH');
    expect(error.message).toBe('Embedding dimension mismatch: expected 4, got 3');
    expect(error.details).toEqual({ expected: 4, actual: 3 });
  });

  it('invalidEmbeddingValue stringifies the value', () => {
    const error = invalidEmbeddingValue(2, NaN);
    expect(error.code).toBe('INVALID_EMBEDDING_VALUE');
    expect(error.message).toBe('Embedding element 2 is not a finite number: NaN');
    expect(error.details).toEqual({ index: 2, value: 'NaN' });
  });

  it('invalidIdentifier', () => {
    const error = invalidIdentifier('');
    expect(error.code).toBe('INVALID_IDENTIFIER');
    expect(error.details).toEqual({ id: '' });
  });

  it('invalidArgument', () => {
    const error = invalidArgument('topK', 0, 'Must be a positive integer');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.message).toBe("Invalid argument 'topK': Must be a positive integer");
    expect(error.details).toEqual({ field: 'topK', value: 0, reason: 'Must be a positive integer' });
  });

  it('duplicateId', () => {
    const error = duplicateId('a');
    expect(error.code).toBe('DUPLICATE_ID');
    expect(error.message).toBe("Record 'a' already exists");
  });

  it('notOpen names the operation', () => {
    const error = notOpen('search');
    expect(error.code).toBe('NOT_OPEN');
    expect(error.message).toBe('Cannot search: engine is closed. Call open() first.');
    expect(error.details).toEqual({ operation: 'search' });
  });

  it('storageError with and without cause', () => {
    const bare = storageError('/tmp/x', 'open', 'corrupt');
    expect(bare.code).toBe('STORAGE_ERROR');
    expect(bare.message).toBe("Storage error during open on '/tmp/x': corrupt");
    expect(bare.details).toEqual({ path: '/tmp/x', operation: 'open', reason: 'corrupt' });

    const withCause = storageError('/tmp/x', 'write', 'disk full', new Error('ENOSPC'));
    expect(withCause.details?.cause).toBe('ENOSPC');
  });
});

describe('wrapStorage', () => {
  it('returns the value of the operation', () => {
    expect(wrapStorage('/tmp/x', 'read', () => 42)).toBe(42);
  });

  it('wraps foreign errors into STORAGE_ERROR', () => {
    try {
      wrapStorage('/tmp/x', 'write', () => {
        throw new Error('EACCES: permission denied');
      });
      expect.unreachable();
    } catch (error) {
      expect(isChunkDbError(error)).toBe(true);
      if (isChunkDbError(error)) {
        expect(error.code).toBe('STORAGE_ERROR');
        expect(error.details).toEqual({
          path: '/tmp/x',
          operation: 'write',
          reason: 'EACCES: permission denied',
          cause: 'EACCES: permission denied',
        });
      }
    }
  });

  it('passes ChunkDbErrors through unchanged', () => {
    const original = dimensionMismatch(4, 2);
    expect(() =>
      wrapStorage('/tmp/x', 'open', () => {
        throw original;
      }),
    ).toThrow(original);
  });
});
