/**
 * NewsRelay — Blob Stores
 *
 * Persisted state is a handful of JSON documents addressed by key.
 * FileBlobStore keeps them on local disk; SupabaseBlobStore in a
 * Supabase Storage bucket for hosts without a persistent volume.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import type { SupabaseClient } from '@supabase/supabase-js';

export interface BlobStore {
  /** Document contents, or null when the key has never been written */
  read(key: string): Promise<string | null>;
  write(key: string, contents: string): Promise<void>;
}

// ============================================================
// LOCAL FILES
// ============================================================

export class FileBlobStore implements BlobStore {
  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  /**
   * Write-then-rename so a crash never leaves a half-written document.
   */
  async write(key: string, contents: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, contents, 'utf-8');
    await rename(temp, target);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================
// SUPABASE STORAGE
// ============================================================

export class SupabaseBlobStore implements BlobStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string
  ) {}

  async read(key: string): Promise<string | null> {
    const { data, error } = await this.client.storage.from(this.bucket).download(`${key}.json`);
    if (error) {
      if (isNotFound(error)) return null;
      throw new Error(`Supabase download failed for ${key}: ${error.message}`);
    }
    return data.text();
  }

  async write(key: string, contents: string): Promise<void> {
    const { error } = await this.client.storage
      .from(this.bucket)
      .upload(`${key}.json`, contents, { contentType: 'application/json', upsert: true });
    if (error) {
      throw new Error(`Supabase upload failed for ${key}: ${error.message}`);
    }
  }
}

function isNotFound(error: { message: string }): boolean {
  if (/not.?found/i.test(error.message)) return true;
  return 'status' in error && (error.status === 400 || error.status === 404);
}
