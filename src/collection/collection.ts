/**
 * Collection - durable id → record map
 *
 * Records live in SQLite (RecordStore) and are mirrored in memory together
 * with a similarity index. Every mutation is committed to SQLite first and
 * only then applied to the in-memory view, so a failed write leaves both
 * unchanged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  dimensionMismatch,
  duplicateId,
  notOpen,
  storageError,
  wrapStorage,
} from '../errors.js';
import { createLogger } from '../logger.js';
import { RecordStore, type Durability, type RecordRow } from '../store/record-store.js';
import { decodeEmbedding, encodeEmbedding } from '../store/embedding-codec.js';
import { readDescriptor, writeDescriptor, type CollectionDescriptor } from '../store/descriptor.js';
import { assertValidRecord, validateRecord, type ValidationPolicy } from '../validation/record-validator.js';
import { FlatVectorIndex } from '../vector/flat-index.js';
import type { VectorIndex, VectorSearchResult } from '../vector/vector-index.js';
import {
  FORMAT_VERSION,
  type ChunkDbError,
  type ChunkRecord,
  type CollectionStats,
  type DuplicatePolicy,
  type IntegrityReport,
  type Metadata,
  type RecordInput,
  type ScoreMapping,
} from '../types.js';

const logger = createLogger('Collection');

export const RECORDS_FILE = 'records.db';

export interface CollectionOptions {
  /** Name recorded in the descriptor when the collection is created */
  name: string;
  dimension: number;
  rejectEmptyText?: boolean;
  duplicatePolicy?: DuplicatePolicy;
  scoreMapping?: ScoreMapping;
  durability?: Durability;
}

/** A search hit before it is shaped into a SearchResult. */
export interface RankedRecord {
  record: ChunkRecord;
  score: number;
}

// Checked as entries: a record schema would assign keys such as __proto__ instead of defining them
const storedMetadataEntriesSchema = z.array(
  z.tuple([z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])]),
);

function* iterateSnapshot(records: ChunkRecord[]): IterableIterator<ChunkRecord> {
  yield* records;
}

export class Collection {
  private records: Map<string, ChunkRecord> = new Map();
  private index: VectorIndex;
  private lastCreatedAt = 0;
  private lastSeq = 0;
  private closed = false;
  private readonly policy: ValidationPolicy;
  readonly duplicatePolicy: DuplicatePolicy;
  private readonly dbPath: string;

  private constructor(
    readonly dir: string,
    private readonly descriptor: CollectionDescriptor,
    private readonly store: RecordStore,
    options: CollectionOptions,
  ) {
    this.dbPath = path.join(dir, RECORDS_FILE);
    this.policy = { dimension: descriptor.dimension, rejectEmptyText: options.rejectEmptyText ?? false };
    this.duplicatePolicy = options.duplicatePolicy ?? 'upsert';
    this.index = new FlatVectorIndex(descriptor.dimension, options.scoreMapping ?? 'clamp');
  }

  /**
   * Open the collection rooted at `dir`, creating it if needed.
   *
   * Fails with DIMENSION_MISMATCH if the stored dimension differs from
   * `options.dimension`, and with STORAGE_ERROR if the directory holds a
   * record table without a descriptor, or anything SQLite or the decoder
   * rejects. Nothing is discarded on failure.
   */
  static open(dir: string, options: CollectionOptions): Collection {
    wrapStorage(dir, 'open', () => fs.mkdirSync(dir, { recursive: true }));
    const dbPath = path.join(dir, RECORDS_FILE);

    let descriptor = readDescriptor(dir);
    if (descriptor) {
      if (descriptor.dimension !== options.dimension) {
        throw dimensionMismatch(descriptor.dimension, options.dimension);
      }
      if (descriptor.name !== options.name) {
        logger.warn('Collection name differs from descriptor', {
          dir,
          stored: descriptor.name,
          requested: options.name,
        });
      }
    } else {
      // The descriptor is always written before the database file
      if (fs.existsSync(dbPath)) {
        throw storageError(dbPath, 'open', 'corrupt: record table present but collection descriptor missing');
      }
      descriptor = {
        formatVersion: FORMAT_VERSION,
        name: options.name,
        dimension: options.dimension,
        createdAt: new Date().toISOString(),
      };
      writeDescriptor(dir, descriptor);
      logger.info('Created collection', { dir, name: descriptor.name, dimension: descriptor.dimension });
    }

    const store = wrapStorage(dbPath, 'open', () => RecordStore.open(dbPath, options.durability ?? 'full'));
    const collection = new Collection(dir, descriptor, store, options);
    try {
      const integrity = wrapStorage(dbPath, 'open', () => store.checkIntegrity());
      if (!integrity.ok) {
        throw storageError(dbPath, 'open', `corrupt: ${integrity.errors.join('; ')}`);
      }
      collection.load();
    } catch (error) {
      store.close();
      throw error;
    }

    logger.info('Opened collection', { dir, size: collection.size() });
    return collection;
  }

  get name(): string {
    return this.descriptor.name;
  }

  get dimension(): number {
    return this.descriptor.dimension;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  private load(): void {
    const rows = wrapStorage(this.dbPath, 'load', () => this.store.listAll());
    for (const row of rows) {
      const record = this.decodeRow(row);
      this.records.set(record.id, record);
      this.index.add(record.id, record.embedding);
      this.lastCreatedAt = Math.max(this.lastCreatedAt, record.createdAt);
      this.lastSeq = Math.max(this.lastSeq, row.seq);
    }
  }

  private decodeRow(row: RecordRow): ChunkRecord {
    const embedding = decodeEmbedding(row.embedding, this.dimension);
    if (!embedding) {
      throw storageError(
        this.dbPath,
        'load',
        `corrupt: record '${row.id}' has a ${row.embedding.length}-byte embedding, expected ${this.dimension} elements`,
      );
    }

    let metadata: Metadata;
    try {
      const parsed: unknown = JSON.parse(row.metadata);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('metadata is not an object');
      }
      metadata = Object.fromEntries(storedMetadataEntriesSchema.parse(Object.entries(parsed)));
    } catch (error) {
      throw storageError(this.dbPath, 'load', `corrupt: record '${row.id}' has unreadable metadata`, error);
    }

    return freezeRecord({
      id: row.id,
      text: row.text,
      sourceReference: row.sourceReference,
      metadata,
      embedding,
      embeddingModelId: row.embeddingModelId,
      createdAt: row.createdAt,
    });
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Validate a record against this collection's policy without writing it.
   */
  validate(input: RecordInput): ChunkDbError | null {
    return validateRecord(input, this.policy);
  }

  /**
   * Insert or replace a record (replace only under the upsert policy).
   */
  put(input: RecordInput): ChunkRecord {
    const [record] = this.putMany([input]);
    return record;
  }

  /**
   * Write several records in one transaction. Every record is validated
   * before anything is written; the first failure is thrown.
   */
  putMany(inputs: readonly RecordInput[]): ChunkRecord[] {
    this.assertOpen('put records');

    const seen = new Set<string>();
    for (const input of inputs) {
      assertValidRecord(input, this.policy);
      if (this.duplicatePolicy === 'reject' && (this.records.has(input.id) || seen.has(input.id))) {
        throw duplicateId(input.id);
      }
      seen.add(input.id);
    }
    if (inputs.length === 0) {
      return [];
    }

    let createdAt = this.lastCreatedAt;
    let seq = this.lastSeq;
    const now = Date.now();
    const staged: Array<{ record: ChunkRecord; row: RecordRow }> = inputs.map((input) => {
      createdAt = Math.max(createdAt, now);
      seq += 1;
      const record = toRecord(input, createdAt);
      return { record, row: toRow(record, seq) };
    });

    wrapStorage(this.dbPath, 'write', () => this.store.upsertMany(staged.map((s) => s.row)));

    this.lastCreatedAt = createdAt;
    this.lastSeq = seq;
    for (const { record } of staged) {
      // Delete first so that Map order follows insertion order after an upsert
      this.records.delete(record.id);
      this.records.set(record.id, record);
      this.index.add(record.id, record.embedding);
    }
    logger.debug('Wrote records', { count: staged.length });
    return staged.map((s) => s.record);
  }

  /**
   * Remove a record. Returns false if it did not exist.
   */
  remove(id: string): boolean {
    return this.removeMany([id]) === 1;
  }

  /**
   * Remove several records in one transaction; returns the number removed.
   */
  removeMany(ids: readonly string[]): number {
    this.assertOpen('remove records');
    const existing = Array.from(new Set(ids)).filter((id) => this.records.has(id));
    if (existing.length === 0) {
      return 0;
    }

    const removed = wrapStorage(this.dbPath, 'delete', () => this.store.deleteMany(existing));
    for (const id of existing) {
      this.records.delete(id);
      this.index.remove(id);
    }
    return removed;
  }

  /**
   * Remove every record matching the predicate.
   */
  removeWhere(predicate: (record: ChunkRecord) => boolean): number {
    this.assertOpen('remove records');
    const ids: string[] = [];
    for (const record of this.records.values()) {
      if (predicate(record)) {
        ids.push(record.id);
      }
    }
    return this.removeMany(ids);
  }

  /**
   * Remove all records. The descriptor and dimension are kept.
   */
  clear(): number {
    this.assertOpen('clear');
    const removed = wrapStorage(this.dbPath, 'delete', () => this.store.deleteAll());
    this.records.clear();
    this.index.clear();
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get(id: string): ChunkRecord | null {
    this.assertOpen('get');
    return this.records.get(id) ?? null;
  }

  has(id: string): boolean {
    this.assertOpen('get');
    return this.records.has(id);
  }

  size(): number {
    this.assertOpen('get size');
    return this.records.size;
  }

  /**
   * Iterate records in insertion order (an upsert moves a record to the end).
   * The set of records is fixed when all() is called: later writes are not seen.
   */
  all(): IterableIterator<ChunkRecord> {
    this.assertOpen('iterate');
    return iterateSnapshot(Array.from(this.records.values()));
  }

  /**
   * Ranked nearest neighbours of `query`. The caller validates `query` and `topK`.
   */
  search(
    query: readonly number[],
    topK: number,
    predicate?: (record: ChunkRecord) => boolean,
  ): RankedRecord[] {
    this.assertOpen('search');
    const accept = predicate
      ? (id: string): boolean => {
          const record = this.records.get(id);
          return record !== undefined && predicate(record);
        }
      : undefined;

    const hits: VectorSearchResult[] = this.index.search(query, topK, accept);
    const ranked: RankedRecord[] = [];
    for (const hit of hits) {
      const record = this.records.get(hit.id);
      if (record) {
        ranked.push({ record, score: hit.score });
      }
    }
    return ranked;
  }

  listSources(): string[] {
    this.assertOpen('list sources');
    const sources = new Set<string>();
    for (const record of this.records.values()) {
      if (record.sourceReference) {
        sources.add(record.sourceReference);
      }
    }
    return Array.from(sources).sort();
  }

  stats(): CollectionStats {
    this.assertOpen('get stats');
    const sources = new Set<string>();
    const models = new Set<string>();
    let totalCharacters = 0;
    let newest: number | null = null;

    for (const record of this.records.values()) {
      if (record.sourceReference) sources.add(record.sourceReference);
      if (record.embeddingModelId) models.add(record.embeddingModelId);
      totalCharacters += record.text.length;
      newest = newest === null ? record.createdAt : Math.max(newest, record.createdAt);
    }

    const totalRecords = this.records.size;
    return {
      name: this.name,
      dimension: this.dimension,
      totalRecords,
      uniqueSources: sources.size,
      embeddingModels: Array.from(models).sort(),
      totalCharacters,
      avgTextLength: totalRecords === 0 ? 0 : Math.round((totalCharacters / totalRecords) * 100) / 100,
      lastUpdatedAt: newest === null ? null : new Date(newest).toISOString(),
    };
  }

  checkIntegrity(): IntegrityReport {
    this.assertOpen('check integrity');
    const report = wrapStorage(this.dbPath, 'check integrity', () => this.store.checkIntegrity());
    const stored = wrapStorage(this.dbPath, 'check integrity', () => this.store.count());
    if (stored !== this.records.size) {
      return {
        ok: false,
        errors: [...report.errors, `record table has ${stored} rows, memory view has ${this.records.size}`],
      };
    }
    return report;
  }

  /**
   * Close the database. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    wrapStorage(this.dbPath, 'close', () => this.store.close());
    this.records.clear();
    this.index.clear();
    logger.info('Closed collection', { dir: this.dir });
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw notOpen(operation);
    }
  }
}

// =============================================================================
// Record helpers
// =============================================================================

function freezeRecord(record: ChunkRecord): ChunkRecord {
  Object.freeze(record.metadata);
  Object.freeze(record.embedding);
  return Object.freeze(record);
}

function toRecord(input: RecordInput, createdAt: number): ChunkRecord {
  return freezeRecord({
    id: input.id,
    text: input.text,
    sourceReference: input.sourceReference ?? '',
    metadata: { ...(input.metadata ?? {}) },
    embedding: input.embedding.slice(),
    embeddingModelId: input.embeddingModelId ?? '',
    createdAt,
  });
}

function toRow(record: ChunkRecord, seq: number): RecordRow {
  return {
    id: record.id,
    seq,
    text: record.text,
    sourceReference: record.sourceReference,
    metadata: JSON.stringify(record.metadata),
    embedding: encodeEmbedding(record.embedding),
    embeddingModelId: record.embeddingModelId,
    createdAt: record.createdAt,
  };
}
