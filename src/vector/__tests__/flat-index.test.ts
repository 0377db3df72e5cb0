/**
 * FlatVectorIndex Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FlatVectorIndex } from '../flat-index.js';

describe('FlatVectorIndex', () => {
  let index: FlatVectorIndex;

  beforeEach(() => {
    index = new FlatVectorIndex(3);
    index.add('x', [1, 0, 0]);
    index.add('y', [0, 1, 0]);
    index.add('xy', [1, 1, 0]);
  });

  describe('add() / remove()', () => {
    it('should track size', () => {
      expect(index.size).toBe(3);
      expect(index.remove('y')).toBe(true);
      expect(index.remove('y')).toBe(false);
      expect(index.size).toBe(2);
    });

    it('should replace the vector of an existing id', () => {
      index.add('x', [0, 0, 1]);
      expect(index.size).toBe(3);
      const [top] = index.search([0, 0, 1], 1);
      expect(top).toEqual({ id: 'x', score: 1 });
    });

    it('should reject vectors of the wrong dimension', () => {
      expect(() => index.add('bad', [1, 0])).toThrow('Vector dimension (2) must be 3');
    });

    it('clear() should empty the index', () => {
      index.clear();
      expect(index.size).toBe(0);
      expect(index.search([1, 0, 0], 5)).toEqual([]);
    });
  });

  describe('search()', () => {
    it('should rank by cosine similarity', () => {
      const results = index.search([1, 0, 0], 3);
      expect(results.map((r) => r.id)).toEqual(['x', 'xy', 'y']);
      expect(results[0].score).toBe(1);
      expect(results[1].score).toBeCloseTo(Math.SQRT1_2, 10);
      expect(results[2].score).toBe(0);
    });

    it('should return at most topK results', () => {
      expect(index.search([1, 0, 0], 2)).toHaveLength(2);
      expect(index.search([1, 0, 0], 10)).toHaveLength(3);
      expect(index.search([1, 0, 0], 0)).toEqual([]);
    });

    it('should break ties by id', () => {
      const tied = new FlatVectorIndex(2);
      tied.add('b', [1, 0]);
      tied.add('c', [1, 0]);
      tied.add('a', [1, 0]);
      expect(tied.search([1, 0], 3).map((r) => r.id)).toEqual(['a', 'b', 'c']);
    });

    it('should apply the accept predicate before ranking', () => {
      const results = index.search([1, 0, 0], 2, (id) => id !== 'x');
      expect(results.map((r) => r.id)).toEqual(['xy', 'y']);
    });

    it('should clamp negative similarity to 0 by default', () => {
      const [top] = index.search([-1, 0, 0], 1);
      expect(top.score).toBe(0);
    });

    it('should use the shift mapping when configured', () => {
      const shifted = new FlatVectorIndex(2, 'shift');
      shifted.add('same', [1, 0]);
      shifted.add('opposite', [-1, 0]);
      shifted.add('orthogonal', [0, 1]);
      expect(shifted.search([1, 0], 3)).toEqual([
        { id: 'same', score: 1 },
        { id: 'orthogonal', score: 0.5 },
        { id: 'opposite', score: 0 },
      ]);
    });

    it('should score huge and tiny vectors like any other', () => {
      const scaled = new FlatVectorIndex(4);
      scaled.add('big', [1e200, 0, 0, 0]);
      scaled.add('tiny', [0, 1e-170, 0, 0]);
      scaled.add('mixed', [1, 1, 0, 0]);

      expect(scaled.search([1e200, 0, 0, 0], 1)).toEqual([{ id: 'big', score: 1 }]);
      expect(scaled.search([0, 1e-170, 0, 0], 1)).toEqual([{ id: 'tiny', score: 1 }]);
      for (const hit of scaled.search([1e-300, 1e300, 0, 0], 3)) {
        expect(hit.score).toBeGreaterThanOrEqual(0);
        expect(hit.score).toBeLessThanOrEqual(1);
      }
    });

    it('should reject queries of the wrong dimension', () => {
      expect(() => index.search([1, 0], 1)).toThrow('Query dimension (2) must be 3');
    });
  });
});
