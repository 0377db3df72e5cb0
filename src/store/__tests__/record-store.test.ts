/**
 * RecordStore Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { RecordStore, type RecordRow } from '../record-store.js';
import { encodeEmbedding, decodeEmbedding } from '../embedding-codec.js';
import { makeTempDir, removeDir } from '../../__tests__/helpers.js';

function find(store: RecordStore, id: string): RecordRow | undefined {
  return store.listAll().find((r) => r.id === id);
}

function row(id: string, seq: number, overrides: Partial<RecordRow> = {}): RecordRow {
  return {
    id,
    seq,
    text: `text ${id}`,
    sourceReference: `doc-${id}`,
    metadata: '{}',
    embedding: encodeEmbedding([seq, 0.5]),
    embeddingModelId: 'test-model',
    createdAt: 1_700_000_000_000 + seq,
    ...overrides,
  };
}

describe('RecordStore', () => {
  let tmpDir: string;
  let dbPath: string;
  let store: RecordStore;

  beforeEach(() => {
    tmpDir = makeTempDir();
    dbPath = path.join(tmpDir, 'records.db');
    store = RecordStore.open(dbPath, 'full');
  });

  afterEach(() => {
    store.close();
    removeDir(tmpDir);
  });

  it('should start empty', () => {
    expect(store.count()).toBe(0);
    expect(store.listAll()).toEqual([]);
    expect(find(store, 'missing')).toBeUndefined();
  });

  it('should insert and read back rows', () => {
    store.upsertMany([row('a', 1, { metadata: '{"lang":"en"}' })]);
    const stored = find(store, 'a');
    expect(stored).toBeDefined();
    expect(stored?.text).toBe('text a');
    expect(stored?.sourceReference).toBe('doc-a');
    expect(stored?.metadata).toBe('{"lang":"en"}');
    expect(stored?.embeddingModelId).toBe('test-model');
    expect(stored?.createdAt).toBe(1_700_000_000_001);
    expect(stored && decodeEmbedding(stored.embedding, 2)).toEqual([1, 0.5]);
  });

  it('should list rows in seq order', () => {
    store.upsertMany([row('c', 1), row('a', 2), row('b', 3)]);
    expect(store.listAll().map((r) => r.id)).toEqual(['c', 'a', 'b']);
  });

  it('should replace a row on conflict and take the new seq', () => {
    store.upsertMany([row('a', 1), row('b', 2)]);
    store.upsertMany([row('a', 3, { text: 'replaced' })]);
    expect(store.count()).toBe(2);
    expect(find(store, 'a')?.text).toBe('replaced');
    expect(store.listAll().map((r) => r.id)).toEqual(['b', 'a']);
  });

  it('should count deleted rows', () => {
    store.upsertMany([row('a', 1), row('b', 2), row('c', 3)]);
    expect(store.deleteMany(['a', 'missing', 'c'])).toBe(2);
    expect(store.deleteMany([])).toBe(0);
    expect(store.listAll().map((r) => r.id)).toEqual(['b']);
  });

  it('should delete everything', () => {
    store.upsertMany([row('a', 1), row('b', 2)]);
    expect(store.deleteAll()).toBe(2);
    expect(store.count()).toBe(0);
  });

  it('should persist across reopen', () => {
    store.upsertMany([row('a', 1)]);
    store.close();
    store = RecordStore.open(dbPath, 'normal');
    expect(find(store, 'a')?.text).toBe('text a');
  });

  it('should report a healthy database', () => {
    expect(store.checkIntegrity()).toEqual({ ok: true, errors: [] });
  });

  it('close() should be idempotent', () => {
    store.close();
    expect(() => store.close()).not.toThrow();
  });
});

describe('embedding codec', () => {
  it('should store 8 bytes per element', () => {
    expect(encodeEmbedding([0.1, 0.2, 0.3]).length).toBe(24);
  });

  it('should preserve values exactly', () => {
    const values = [0.1, -2.5e-8, 1 / 3, Number.MAX_VALUE];
    expect(decodeEmbedding(encodeEmbedding(values), 4)).toEqual(values);
  });

  it('should decode from an unaligned offset', () => {
    const backing = Buffer.alloc(17);
    encodeEmbedding([0.25, -4]).copy(backing, 1);
    expect(decodeEmbedding(backing.subarray(1), 2)).toEqual([0.25, -4]);
  });

  it('should return null when the length does not match the dimension', () => {
    expect(decodeEmbedding(encodeEmbedding([1, 2, 3]), 4)).toBeNull();
    expect(decodeEmbedding(Buffer.alloc(7), 1)).toBeNull();
  });
});
