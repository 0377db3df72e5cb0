/**
 * ChunkDB Core Types
 *
 * Shared types for the ChunkDB library, organized by domain:
 * Records, Search, Collection, Errors.
 */

// =============================================================================
// Constants
// =============================================================================

/** Version of the on-disk layout written to the collection descriptor. */
export const FORMAT_VERSION = 1;

/** Default embedding dimension (all-MiniLM-L6-v2 sized vectors). */
export const DEFAULT_DIMENSION = 384;

// =============================================================================
// Record Types
// =============================================================================

/** A metadata value. Nested objects and arrays are not stored. */
export type MetadataValue = string | number | boolean | null;

/** String-keyed metadata map, opaque to the engine except for filters. */
export type Metadata = Record<string, MetadataValue>;

/**
 * A record as supplied by the embedding producer.
 */
export interface RecordInput {
  /** Primary key, non-empty */
  id: string;
  /** Text associated with the embedding (may be empty unless rejectEmptyText) */
  text: string;
  /** Where the text came from; not interpreted by the engine */
  sourceReference?: string;
  metadata?: Metadata;
  /** Exactly `dimension` finite numbers */
  embedding: number[];
  /** Tag of the model that produced the embedding */
  embeddingModelId?: string;
}

/**
 * A stored record. Immutable: updates replace the whole record.
 */
export interface ChunkRecord {
  readonly id: string;
  readonly text: string;
  readonly sourceReference: string;
  readonly metadata: Readonly<Metadata>;
  readonly embedding: readonly number[];
  readonly embeddingModelId: string;
  /** Insertion time in epoch milliseconds, non-decreasing in insertion order */
  readonly createdAt: number;
}

// =============================================================================
// Search Types
// =============================================================================

/**
 * A single ranked result for a similarity query.
 */
export interface SearchResult {
  id: string;
  text: string;
  sourceReference: string;
  metadata: Metadata;
  embeddingModelId: string;
  createdAt: number;
  /** Similarity mapped to 0-1, higher = more similar */
  score: number;
  /** 1-based position in the result list */
  rank: number;
}

/** How raw cosine similarity is mapped to a 0-1 score. */
export type ScoreMapping = 'clamp' | 'shift';

// =============================================================================
// Batch / Collection Types
// =============================================================================

export interface RejectedRecord {
  /** ID as supplied (may be empty or non-string input coerced to '') */
  id: string;
  error: ChunkDbError;
}

export interface BatchResult {
  inserted: number;
  rejected: RejectedRecord[];
}

/** Policy for inserting a record whose id already exists. */
export type DuplicatePolicy = 'upsert' | 'reject';

export interface CollectionStats {
  name: string;
  dimension: number;
  totalRecords: number;
  uniqueSources: number;
  /** Distinct embedding model ids, sorted */
  embeddingModels: string[];
  totalCharacters: number;
  /** Mean text length, rounded to 2 decimals */
  avgTextLength: number;
  /** ISO 8601 timestamp of the newest record (null when empty) */
  lastUpdatedAt: string | null;
}

export interface IntegrityReport {
  ok: boolean;
  errors: string[];
}

export type EngineState = 'open' | 'closed';

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  state: EngineState;
  collectionDir: string;
  collection: string;
  dimension: number;
  size: number;
  integrity: IntegrityReport;
  /** Whether a query embedder is configured for text search */
  queryEmbedder: boolean;
  error?: string;
  timestamp: string;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error codes for ChunkDbError.
 */
export type ChunkDbErrorCode =
  | 'DIMENSION_MISMATCH'
  | 'INVALID_EMBEDDING_VALUE'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_ARGUMENT'
  | 'DUPLICATE_ID'
  | 'NOT_OPEN'
  | 'STORAGE_ERROR';

/**
 * Typed error class for ChunkDB operations.
 *
 * Error details structure by code:
 * - DIMENSION_MISMATCH: { expected, actual }
 * - INVALID_EMBEDDING_VALUE: { index, value }
 * - INVALID_IDENTIFIER: { id }
 * - INVALID_ARGUMENT: { field, value, reason }
 * - DUPLICATE_ID: { id }
 * - NOT_OPEN: { operation }
 * - STORAGE_ERROR: { path, operation, reason, cause? }
 */
export class ChunkDbError extends Error {
  constructor(
    public readonly code: ChunkDbErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ChunkDbError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ChunkDbError.prototype);
  }
}
