/**
 * ChunkDB - embedding storage and similarity search
 *
 * Public API exports for the ChunkDB library.
 */

// =============================================================================
// Configuration
// =============================================================================

export { chunkDbConfigSchema, parseConfig, getCollectionDir } from './config.js';
export type { ChunkDbConfig, ChunkDbConfigInput } from './config.js';

// =============================================================================
// Types
// =============================================================================

export { FORMAT_VERSION, DEFAULT_DIMENSION } from './types.js';

export type {
  MetadataValue,
  Metadata,
  RecordInput,
  ChunkRecord,
  SearchResult,
  ScoreMapping,
  BatchResult,
  RejectedRecord,
  DuplicatePolicy,
  CollectionStats,
  IntegrityReport,
  EngineState,
  HealthReport,
} from './types.js';

// Error types
export { ChunkDbError } from './types.js';
export type { ChunkDbErrorCode } from './types.js';

// =============================================================================
// Engine
// =============================================================================

export { ChunkDb } from './engine.js';
export type { ChunkDbOptions, SearchOptions } from './engine.js';

// =============================================================================
// Building blocks
// =============================================================================

export { Collection } from './collection/collection.js';
export type { CollectionOptions, RankedRecord } from './collection/collection.js';
export { BatchCoordinator } from './batch/batch-coordinator.js';
export { DeletionManager } from './deletion/deletion-manager.js';
export { FlatVectorIndex } from './vector/flat-index.js';
export type { VectorIndex, VectorSearchResult } from './vector/vector-index.js';
export { cosineSimilarity, toScore } from './vector/similarity.js';
export { validateRecord, validateQueryVector, validateTopK } from './validation/record-validator.js';
export type { ValidationPolicy } from './validation/record-validator.js';
export type { QueryEmbedder } from './embedding/query-embedder.js';

// =============================================================================
// Filters
// =============================================================================

export { where, matchesFilter, parseFilter, recordFilterSchema } from './filter/record-filter.js';
export type { RecordFilter } from './filter/record-filter.js';

// =============================================================================
// Error Utilities
// =============================================================================

export {
  isChunkDbError,
  dimensionMismatch,
  invalidEmbeddingValue,
  invalidIdentifier,
  invalidArgument,
  duplicateId,
  notOpen,
  storageError,
} from './errors.js';

// =============================================================================
// Logger
// =============================================================================

export { createLogger, setGlobalLogLevel, getGlobalLogLevel } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
