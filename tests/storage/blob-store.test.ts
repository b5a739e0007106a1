/**
 * Tests for the local file blob store
 */

import { mkdtempSync, readdirSync } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { FileBlobStore } from '../../src/storage/blob-store';

describe('FileBlobStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = path.join(mkdtempSync(path.join(os.tmpdir(), 'newsrelay-store-')), 'state');
  });

  it('should return null for a key never written', async () => {
    await expect(new FileBlobStore(dir).read('portal-history')).resolves.toBeNull();
  });

  it('should create the directory and read back what was written', async () => {
    const store = new FileBlobStore(dir);

    await store.write('analyzed-urls', '["https://dzen.ru/a/1"]');

    await expect(store.read('analyzed-urls')).resolves.toBe('["https://dzen.ru/a/1"]');
    expect(readdirSync(dir)).toEqual(['analyzed-urls.json']);
  });

  it('should replace a document on rewrite', async () => {
    const store = new FileBlobStore(dir);

    await store.write('portal-history', '[]');
    await store.write('portal-history', '[1]');

    await expect(store.read('portal-history')).resolves.toBe('[1]');
  });
});
