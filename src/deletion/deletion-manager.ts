/**
 * Deletion Manager
 *
 * Removes records singly, by filter, or by source, and reports exactly how
 * many were removed. A filter that matches nothing removes nothing.
 */

import { invalidArgument, invalidIdentifier } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Collection } from '../collection/collection.js';
import { matchesFilter, parseFilter } from '../filter/record-filter.js';

const logger = createLogger('DeletionManager');

export class DeletionManager {
  constructor(private readonly collection: Collection) {}

  /**
   * Remove one record. Returns false (not an error) if it does not exist.
   */
  remove(id: string): boolean {
    if (typeof id !== 'string' || id.length === 0) {
      throw invalidIdentifier(id);
    }
    const removed = this.collection.remove(id);
    logger.debug('Remove record', { id, removed });
    return removed;
  }

  /**
   * Remove every record matching `filter`. The filter is validated first.
   */
  removeWhere(filter: unknown): number {
    const parsed = parseFilter(filter);
    const removed = this.collection.removeWhere((record) => matchesFilter(record, parsed));
    logger.info('Removed records by filter', { filter: parsed, removed });
    return removed;
  }

  /**
   * Remove all records whose source reference equals `sourceReference` exactly.
   */
  removeBySource(sourceReference: string): number {
    if (typeof sourceReference !== 'string' || sourceReference.trim().length === 0) {
      throw invalidArgument('sourceReference', sourceReference, 'Source reference cannot be empty');
    }
    const removed = this.collection.removeWhere((record) => record.sourceReference === sourceReference);
    logger.info('Removed records by source', { sourceReference, removed });
    return removed;
  }

  clear(): number {
    const removed = this.collection.clear();
    logger.info('Cleared collection', { removed });
    return removed;
  }
}
