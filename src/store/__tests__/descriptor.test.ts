/**
 * Collection descriptor Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { readDescriptor, writeDescriptor, descriptorPath, type CollectionDescriptor } from '../descriptor.js';
import { makeTempDir, removeDir, captureError } from '../../__tests__/helpers.js';

describe('collection descriptor', () => {
  let tmpDir: string;

  const descriptor: CollectionDescriptor = {
    formatVersion: 1,
    name: 'papers',
    dimension: 4,
    createdAt: '2024-01-01T00:00:00.000Z',
  };

  beforeEach(() => {
    tmpDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it('should return null when no descriptor exists', () => {
    expect(readDescriptor(tmpDir)).toBeNull();
  });

  it('should round-trip through disk', () => {
    writeDescriptor(tmpDir, descriptor);
    expect(readDescriptor(tmpDir)).toEqual(descriptor);
    expect(fs.existsSync(`${descriptorPath(tmpDir)}.tmp`)).toBe(false);
  });

  it('should overwrite an existing descriptor', () => {
    writeDescriptor(tmpDir, descriptor);
    writeDescriptor(tmpDir, { ...descriptor, name: 'renamed' });
    expect(readDescriptor(tmpDir)?.name).toBe('renamed');
  });

  it('should report unparseable JSON as STORAGE_ERROR', () => {
    fs.writeFileSync(descriptorPath(tmpDir), '{ not json');
    const error = captureError(() => readDescriptor(tmpDir));
    expect(error).toMatchObject({
      code: 'STORAGE_ERROR',
      details: { operation: 'open', reason: 'corrupt collection descriptor' },
    });
  });

  it('should report a descriptor with missing fields as STORAGE_ERROR', () => {
    fs.writeFileSync(descriptorPath(tmpDir), JSON.stringify({ formatVersion: 1, name: 'papers' }));
    expect(captureError(() => readDescriptor(tmpDir))).toMatchObject({ code: 'STORAGE_ERROR' });
  });

  it('should reject an unknown format version', () => {
    fs.writeFileSync(descriptorPath(tmpDir), JSON.stringify({ ...descriptor, formatVersion: 99 }));
    expect(captureError(() => readDescriptor(tmpDir))).toMatchObject({ code: 'STORAGE_ERROR' });
  });
});
