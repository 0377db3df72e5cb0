/**
 * Collection descriptor - the fixed-dimension file written once when a
 * collection is created.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { storageError } from '../errors.js';
import { FORMAT_VERSION } from '../types.js';

export const DESCRIPTOR_FILE = 'collection.json';

const descriptorSchema = z.object({
  formatVersion: z.literal(FORMAT_VERSION),
  name: z.string().min(1),
  dimension: z.number().int().positive(),
  /** ISO 8601 */
  createdAt: z.string(),
});

export type CollectionDescriptor = z.infer<typeof descriptorSchema>;

export function descriptorPath(dir: string): string {
  return path.join(dir, DESCRIPTOR_FILE);
}

/**
 * Read the descriptor of the collection at `dir`.
 * Returns null if the collection has never been created; throws
 * STORAGE_ERROR if the file exists but cannot be read or parsed.
 */
export function readDescriptor(dir: string): CollectionDescriptor | null {
  const file = descriptorPath(dir);
  if (!fs.existsSync(file)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw storageError(file, 'open', 'corrupt collection descriptor', error);
  }

  const parsed = descriptorSchema.safeParse(raw);
  if (!parsed.success) {
    throw storageError(file, 'open', `corrupt collection descriptor: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Write the descriptor through a temp file and rename, so a crash never
 * leaves a half-written descriptor behind.
 */
export function writeDescriptor(dir: string, descriptor: CollectionDescriptor): void {
  const file = descriptorPath(dir);
  const tmp = `${file}.tmp`;
  try {
    const fd = fs.openSync(tmp, 'w');
    try {
      fs.writeFileSync(fd, JSON.stringify(descriptor, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmp, file);
  } catch (error) {
    throw storageError(file, 'write', 'failed to write collection descriptor', error);
  }
}
