/**
 * Shared test helpers.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { RecordInput } from '../types.js';

/**
 * Run `fn` and return what it throws. Fails the test if nothing is thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export async function captureAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

export function makeTempDir(prefix = 'chunkdb-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * A 4-dimensional record with sensible defaults.
 */
export function makeRecord(id: string, embedding: number[], overrides: Partial<RecordInput> = {}): RecordInput {
  return {
    id,
    text: `text of ${id}`,
    sourceReference: `https://docs.example/${id}`,
    metadata: {},
    embedding,
    embeddingModelId: 'test-model',
    ...overrides,
  };
}
