/**
 * Batch Coordinator
 *
 * Inserts many records with per-record validation. Invalid records are
 * reported and skipped; valid ones are written in chunks, one SQLite
 * transaction per chunk.
 */

import { duplicateId } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Collection } from '../collection/collection.js';
import type { BatchResult, RecordInput, RejectedRecord } from '../types.js';

const logger = createLogger('BatchCoordinator');

export interface BatchConfig {
  /** Records per transaction */
  maxRecordsPerTransaction: number;
}

export const DEFAULT_BATCH_CONFIG: BatchConfig = {
  maxRecordsPerTransaction: 500,
};

/**
 * Split an array into consecutive chunks of at most `size` elements.
 */
export function chunkArray<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new Error(`Chunk size must be at least 1, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * The id a caller supplied, or '' when the entry has none.
 */
function suppliedId(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'id' in input && typeof input.id === 'string') {
    return input.id;
  }
  return '';
}

export class BatchCoordinator {
  private config: BatchConfig;

  constructor(
    private readonly collection: Collection,
    config: Partial<BatchConfig> = {},
  ) {
    this.config = { ...DEFAULT_BATCH_CONFIG, ...config };
  }

  /**
   * Add records with partial-success semantics.
   *
   * - A record failing validation is added to `rejected` and the rest continue
   * - Under the collection's 'upsert' policy, a repeated id overwrites the earlier copy; both count as inserted
   * - Under 'reject', an id already stored or seen earlier in the batch is rejected
   *
   * Storage failures are not isolated and propagate; chunks committed before
   * the failure stay durable.
   */
  addBatch(records: readonly RecordInput[]): BatchResult {
    const accepted: RecordInput[] = [];
    const rejected: RejectedRecord[] = [];
    const seen = new Set<string>();

    for (const input of records) {
      const error = this.collection.validate(input);
      if (error) {
        rejected.push({ id: suppliedId(input), error });
        continue;
      }
      if (this.collection.duplicatePolicy === 'reject' && (seen.has(input.id) || this.collection.has(input.id))) {
        rejected.push({ id: input.id, error: duplicateId(input.id) });
        continue;
      }
      seen.add(input.id);
      accepted.push(input);
    }

    let inserted = 0;
    for (const chunk of chunkArray(accepted, this.config.maxRecordsPerTransaction)) {
      inserted += this.collection.putMany(chunk).length;
    }

    if (rejected.length > 0) {
      logger.warn('Rejected records in batch', {
        rejected: rejected.length,
        codes: Array.from(new Set(rejected.map((r) => r.error.code))),
      });
    }
    logger.debug('Batch complete', { inserted, rejected: rejected.length });

    return { inserted, rejected };
  }
}
