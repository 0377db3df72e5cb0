/**
 * Record filters
 *
 * A tagged-variant predicate over a record's source reference, model id and
 * metadata. Used to narrow searches and to select records for deletion.
 * String matching is case-sensitive.
 */

import { z } from 'zod';
import { invalidArgument } from '../errors.js';
import type { ChunkRecord, MetadataValue } from '../types.js';

export type RecordFilter =
  | { kind: 'sourceEquals'; value: string }
  | { kind: 'sourceContains'; value: string }
  | { kind: 'sourcePrefix'; value: string }
  | { kind: 'modelEquals'; value: string }
  | { kind: 'metadataEquals'; key: string; value: MetadataValue }
  | { kind: 'metadataExists'; key: string }
  /** Matches when every filter matches (an empty list matches everything) */
  | { kind: 'and'; filters: RecordFilter[] }
  /** Matches when any filter matches (an empty list matches nothing) */
  | { kind: 'or'; filters: RecordFilter[] }
  | { kind: 'not'; filter: RecordFilter };

const metadataValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const recordFilterSchema: z.ZodType<RecordFilter> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('sourceEquals'), value: z.string() }),
    // Empty needles would match every record
    z.object({ kind: z.literal('sourceContains'), value: z.string().min(1) }),
    z.object({ kind: z.literal('sourcePrefix'), value: z.string().min(1) }),
    z.object({ kind: z.literal('modelEquals'), value: z.string() }),
    z.object({ kind: z.literal('metadataEquals'), key: z.string().min(1), value: metadataValueSchema }),
    z.object({ kind: z.literal('metadataExists'), key: z.string().min(1) }),
    z.object({ kind: z.literal('and'), filters: z.array(recordFilterSchema) }),
    z.object({ kind: z.literal('or'), filters: z.array(recordFilterSchema) }),
    z.object({ kind: z.literal('not'), filter: recordFilterSchema }),
  ]),
);

/**
 * Validate an untrusted filter. Throws INVALID_ARGUMENT.
 */
export function parseFilter(input: unknown): RecordFilter {
  const result = recordFilterSchema.safeParse(input);
  if (!result.success) {
    throw invalidArgument('filter', input, 'Not a valid record filter');
  }
  return result.data;
}

function hasKey(metadata: Readonly<Record<string, MetadataValue>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(metadata, key);
}

export function matchesFilter(record: ChunkRecord, filter: RecordFilter): boolean {
  switch (filter.kind) {
    case 'sourceEquals':
      return record.sourceReference === filter.value;
    case 'sourceContains':
      return record.sourceReference.includes(filter.value);
    case 'sourcePrefix':
      return record.sourceReference.startsWith(filter.value);
    case 'modelEquals':
      return record.embeddingModelId === filter.value;
    case 'metadataEquals':
      return hasKey(record.metadata, filter.key) && record.metadata[filter.key] === filter.value;
    case 'metadataExists':
      return hasKey(record.metadata, filter.key);
    case 'and':
      return filter.filters.every((f) => matchesFilter(record, f));
    case 'or':
      return filter.filters.some((f) => matchesFilter(record, f));
    case 'not':
      return !matchesFilter(record, filter.filter);
  }
}

/**
 * Shorthand constructors.
 *
 * @example
 * where.and(where.sourceContains('blocked.example'), where.metadataEquals('lang', 'en'))
 */
export const where = {
  sourceEquals: (value: string): RecordFilter => ({ kind: 'sourceEquals', value }),
  sourceContains: (value: string): RecordFilter => ({ kind: 'sourceContains', value }),
  sourcePrefix: (value: string): RecordFilter => ({ kind: 'sourcePrefix', value }),
  modelEquals: (value: string): RecordFilter => ({ kind: 'modelEquals', value }),
  metadataEquals: (key: string, value: MetadataValue): RecordFilter => ({ kind: 'metadataEquals', key, value }),
  metadataExists: (key: string): RecordFilter => ({ kind: 'metadataExists', key }),
  and: (...filters: RecordFilter[]): RecordFilter => ({ kind: 'and', filters }),
  or: (...filters: RecordFilter[]): RecordFilter => ({ kind: 'or', filters }),
  not: (filter: RecordFilter): RecordFilter => ({ kind: 'not', filter }),
};
