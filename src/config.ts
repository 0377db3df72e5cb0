/**
 * ChunkDB Configuration Schema
 *
 * Defines the configuration structure for the ChunkDb engine with Zod validation.
 * All settings have defaults; only storageRoot is required.
 */

import { z } from 'zod';
import * as path from 'node:path';
import { invalidArgument } from './errors.js';
import { DEFAULT_DIMENSION } from './types.js';

// =============================================================================
// Configuration Schema
// =============================================================================

/** Collection names become directory names, so keep them to a safe charset. */
const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const chunkDbConfigSchema = z.object({
  // --- Required ---
  /** Directory holding one subdirectory per collection */
  storageRoot: z.string().min(1),

  // --- Collection ---
  /** Collection name (subdirectory of storageRoot) */
  collection: z.string().regex(COLLECTION_NAME_PATTERN).default('default'),
  /** Fixed embedding dimension, checked against the stored descriptor on open */
  dimension: z.number().int().positive().default(DEFAULT_DIMENSION),

  // --- Policies ---
  /** Reject records whose text is empty */
  rejectEmptyText: z.boolean().default(false),
  /** What to do when a record id already exists */
  duplicatePolicy: z.enum(['upsert', 'reject']).default('upsert'),
  /**
   * Cosine-to-score mapping.
   * clamp: max(0, cos), for normalized embeddings.
   * shift: (cos + 1) / 2, keeps the ordering of negatively correlated vectors.
   */
  scoreMapping: z.enum(['clamp', 'shift']).default('clamp'),
  /** SQLite synchronous mode: full survives power loss, normal only process crashes */
  durability: z.enum(['full', 'normal']).default('full'),

  // --- Search ---
  search: z
    .object({
      /** Number of results when topK is omitted */
      defaultTopK: z.number().int().positive().default(10),
      /** Largest accepted topK; unbounded when unset */
      maxTopK: z.number().int().positive().optional(),
    })
    .default({}),

  // --- Batch ---
  batch: z
    .object({
      /** Records written per SQLite transaction during addBatch */
      maxRecordsPerTransaction: z.number().int().min(1).max(10000).default(500),
    })
    .default({}),

  // --- Logging ---
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

// =============================================================================
// Type Export
// =============================================================================

/** Fully resolved configuration with all defaults applied */
export type ChunkDbConfig = z.infer<typeof chunkDbConfigSchema>;

/** Input configuration - only storageRoot is required */
export type ChunkDbConfigInput = z.input<typeof chunkDbConfigSchema>;

// =============================================================================
// Config Helpers
// =============================================================================

/**
 * Parse and validate configuration with defaults applied.
 * Throws INVALID_ARGUMENT naming the first offending field.
 */
export function parseConfig(input: unknown): ChunkDbConfig {
  const result = chunkDbConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw invalidArgument(field, input, issue?.message ?? 'Invalid configuration');
  }
  const config = result.data;
  const { defaultTopK, maxTopK } = config.search;
  if (maxTopK !== undefined && defaultTopK > maxTopK) {
    throw invalidArgument(
      'search.defaultTopK',
      defaultTopK,
      `Must not exceed search.maxTopK (${maxTopK})`,
    );
  }
  return config;
}

/**
 * Directory of the configured collection: {storageRoot}/{collection}.
 */
export function getCollectionDir(config: ChunkDbConfig): string {
  return path.join(path.resolve(config.storageRoot), config.collection);
}
