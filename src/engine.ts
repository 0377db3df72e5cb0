/**
 * ChunkDb - Top-level facade for ChunkDB.
 *
 * This is the main entry point of the library. It coordinates:
 * - Configuration parsing and the collection location
 * - The closed → open → closed lifecycle
 * - Validation of queries before they reach the collection
 * - Batch insertion and deletion through their coordinators
 *
 * All operations are synchronous except searchByText, which awaits the
 * configured query embedder.
 */

import type { ChunkDbConfig, ChunkDbConfigInput } from './config.js';
import { getCollectionDir, parseConfig } from './config.js';
import { Collection, type RankedRecord } from './collection/collection.js';
import { BatchCoordinator } from './batch/batch-coordinator.js';
import { DeletionManager } from './deletion/deletion-manager.js';
import { parseFilter, matchesFilter, type RecordFilter } from './filter/record-filter.js';
import { toVector, type QueryEmbedder } from './embedding/query-embedder.js';
import { validateQueryVector, validateTopK } from './validation/record-validator.js';
import { dimensionMismatch, invalidArgument, notOpen } from './errors.js';
import { createLogger, errorData, setGlobalLogLevel } from './logger.js';
import type {
  BatchResult,
  ChunkRecord,
  CollectionStats,
  EngineState,
  HealthReport,
  RecordInput,
  SearchResult,
} from './types.js';

const logger = createLogger('ChunkDb');

/**
 * Options that cannot live in the (serializable) config.
 */
export interface ChunkDbOptions {
  /** Required for searchByText */
  queryEmbedder?: QueryEmbedder;
}

/**
 * Search parameters for searchByVector() and searchByText().
 */
export interface SearchOptions {
  /** Defaults to config.search.defaultTopK */
  topK?: number;
  /** Restrict candidates before ranking */
  filter?: RecordFilter;
}

/**
 * Resources that exist only while the engine is open.
 */
interface OpenState {
  collection: Collection;
  batches: BatchCoordinator;
  deletions: DeletionManager;
}

export class ChunkDb {
  private readonly config: ChunkDbConfig;
  private readonly queryEmbedder: QueryEmbedder | null;
  private current: OpenState | null = null;

  /** Absolute directory of the collection */
  readonly collectionDir: string;

  private constructor(config: ChunkDbConfig, options: ChunkDbOptions) {
    this.config = config;
    this.collectionDir = getCollectionDir(config);
    this.queryEmbedder = options.queryEmbedder ?? null;
  }

  /**
   * Parse the config and open (or create) the configured collection.
   * Only storageRoot is required; everything else has defaults.
   */
  static open(inputConfig: ChunkDbConfigInput, options: ChunkDbOptions = {}): ChunkDb {
    const config = parseConfig(inputConfig);
    setGlobalLogLevel(config.logLevel);

    if (options.queryEmbedder && options.queryEmbedder.dimension !== config.dimension) {
      throw dimensionMismatch(config.dimension, options.queryEmbedder.dimension);
    }

    const db = new ChunkDb(config, options);
    db.reopen();
    return db;
  }

  get state(): EngineState {
    return this.current ? 'open' : 'closed';
  }

  get dimension(): number {
    return this.config.dimension;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Open the collection again after close(). No-op if already open.
   */
  reopen(): void {
    if (this.current) {
      return;
    }
    const collection = Collection.open(this.collectionDir, {
      name: this.config.collection,
      dimension: this.config.dimension,
      rejectEmptyText: this.config.rejectEmptyText,
      duplicatePolicy: this.config.duplicatePolicy,
      scoreMapping: this.config.scoreMapping,
      durability: this.config.durability,
    });
    this.current = {
      collection,
      batches: new BatchCoordinator(collection, {
        maxRecordsPerTransaction: this.config.batch.maxRecordsPerTransaction,
      }),
      deletions: new DeletionManager(collection),
    };
    logger.info('ChunkDb opened', { collectionDir: this.collectionDir, size: collection.size() });
  }

  /**
   * Flush and close the collection. Idempotent.
   */
  close(): void {
    if (!this.current) {
      return;
    }
    const { collection } = this.current;
    this.current = null;
    collection.close();
    logger.info('ChunkDb closed', { collectionDir: this.collectionDir });
  }

  private require(operation: string): OpenState {
    if (!this.current) {
      throw notOpen(operation);
    }
    return this.current;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Insert one record (upsert or reject on an existing id, per config).
   * Validation errors are thrown.
   */
  add(record: RecordInput): ChunkRecord {
    return this.require('add').collection.put(record);
  }

  /**
   * Insert many records; invalid ones are reported in `rejected`.
   */
  addBatch(records: readonly RecordInput[]): BatchResult {
    const { batches } = this.require('add batch');
    if (!Array.isArray(records)) {
      throw invalidArgument('records', records, 'Must be an array of records');
    }
    return batches.addBatch(records);
  }

  remove(id: string): boolean {
    return this.require('remove').deletions.remove(id);
  }

  removeWhere(filter: RecordFilter): number {
    return this.require('remove').deletions.removeWhere(filter);
  }

  removeBySource(sourceReference: string): number {
    return this.require('remove').deletions.removeBySource(sourceReference);
  }

  clear(): number {
    return this.require('clear').deletions.clear();
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get(id: string): ChunkRecord | null {
    return this.require('get').collection.get(id);
  }

  size(): number {
    return this.require('get size').collection.size();
  }

  /**
   * Iterate all records (snapshot taken at call time, insertion order).
   */
  all(): IterableIterator<ChunkRecord> {
    return this.require('iterate').collection.all();
  }

  listSources(): string[] {
    return this.require('list sources').collection.listSources();
  }

  stats(): CollectionStats {
    return this.require('get stats').collection.stats();
  }

  /**
   * Rank records by cosine similarity to `vector`.
   */
  searchByVector(vector: readonly number[], options: SearchOptions = {}): SearchResult[] {
    const { collection } = this.require('search');

    const topK = options.topK ?? this.config.search.defaultTopK;
    const topKError = validateTopK(topK, this.config.search.maxTopK);
    if (topKError) {
      throw topKError;
    }
    const vectorError = validateQueryVector(vector, this.config.dimension);
    if (vectorError) {
      throw vectorError;
    }
    const filter = options.filter === undefined ? undefined : parseFilter(options.filter);

    const startTime = Date.now();
    const ranked = collection.search(
      vector,
      topK,
      filter ? (record) => matchesFilter(record, filter) : undefined,
    );
    logger.debug('Vector search', { topK, results: ranked.length, tookMs: Date.now() - startTime });

    return ranked.map(toSearchResult);
  }

  /**
   * Embed `text` with the configured query embedder, then search by vector.
   */
  async searchByText(text: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    this.require('search');
    if (typeof text !== 'string' || text.trim().length === 0) {
      throw invalidArgument('query', text, 'Query cannot be empty');
    }
    if (!this.queryEmbedder) {
      throw invalidArgument('queryEmbedder', null, 'Text search needs a query embedder; pass one to ChunkDb.open()');
    }

    const vector = toVector(await this.queryEmbedder.embed(text));
    if (vector.length !== this.config.dimension) {
      throw dimensionMismatch(this.config.dimension, vector.length);
    }
    // The engine may have been closed while the embedder was running
    return this.searchByVector(vector, options);
  }

  // ---------------------------------------------------------------------------
  // Maintenance
  // ---------------------------------------------------------------------------

  /**
   * Report engine health. Never throws.
   */
  healthCheck(): HealthReport {
    const base = {
      state: this.state,
      collectionDir: this.collectionDir,
      collection: this.config.collection,
      dimension: this.config.dimension,
      queryEmbedder: this.queryEmbedder !== null,
      timestamp: new Date().toISOString(),
    };

    if (!this.current) {
      return {
        ...base,
        status: 'unhealthy',
        size: 0,
        integrity: { ok: false, errors: [] },
        error: 'Engine is closed',
      };
    }

    try {
      const { collection } = this.current;
      const integrity = collection.checkIntegrity();
      return {
        ...base,
        status: integrity.ok ? 'healthy' : 'unhealthy',
        size: collection.size(),
        integrity,
      };
    } catch (error) {
      logger.error('Health check failed', errorData(error));
      return {
        ...base,
        status: 'unhealthy',
        size: 0,
        integrity: { ok: false, errors: [] },
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function toSearchResult(hit: RankedRecord, position: number): SearchResult {
  const { record } = hit;
  return {
    id: record.id,
    text: record.text,
    sourceReference: record.sourceReference,
    metadata: { ...record.metadata },
    embeddingModelId: record.embeddingModelId,
    createdAt: record.createdAt,
    score: hit.score,
    rank: position + 1,
  };
}
