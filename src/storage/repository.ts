/**
 * NewsRelay — State Repository
 *
 * Typed load/save of the persisted documents on top of a BlobStore.
 *
 * Loading is lenient about content and strict about I/O: a document that
 * does not parse, or entries that fail validation, are dropped with a
 * warning; a store that cannot be read raises PersistenceError so a cycle
 * never mistakes an outage for empty history.
 */

import { z } from 'zod';
import { PersistenceError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';
import type { CacheEntry } from '../matching/embedding-cache';
import type { ReferenceEmbeddings } from '../matching/scorer';
import type { Vector } from '../providers/embeddings';
import {
  MatchRecordSchema,
  ReferenceItemSchema,
  type MatchRecord,
  type ReferenceItem,
} from '../types/news';
import { AnalyzedUrlSet, DEFAULT_MAX_ANALYZED_URLS } from './analyzed-urls';
import type { BlobStore } from './blob-store';

export const STATE_KEYS = {
  portalHistory: 'portal-history',
  aggregatorHistory: 'aggregator-history',
  analyzedUrls: 'analyzed-urls',
  embeddingCache: 'embedding-cache',
} as const;

export type StateKey = (typeof STATE_KEYS)[keyof typeof STATE_KEYS];

// ============================================================
// SNAPSHOT SCHEMAS
// ============================================================

const VectorSchema = z.array(z.number());

const CandidateEntrySchema = z.object({
  key: z.string(),
  value: VectorSchema,
  createdAt: z.number(),
});

const ReferenceEntrySchema = z.object({
  key: z.string(),
  value: z.object({
    title: VectorSchema,
    titleSnippet: VectorSchema,
    snippet: VectorSchema,
  }),
  createdAt: z.number(),
});

const CacheSnapshotSchema = z.object({
  model: z.string().optional(),
  candidate: z.array(CandidateEntrySchema),
  reference: z.array(ReferenceEntrySchema),
});

export interface CacheSnapshot {
  model?: string;
  candidate: CacheEntry<Vector>[];
  reference: CacheEntry<ReferenceEmbeddings>[];
}

// ============================================================
// REPOSITORY
// ============================================================

export interface StateRepositoryOptions {
  maxAnalyzedUrls?: number;
}

export class StateRepository {
  private readonly log = logger.child({ component: 'state' });
  private readonly maxAnalyzedUrls: number;

  constructor(
    private readonly store: BlobStore,
    options: StateRepositoryOptions = {}
  ) {
    this.maxAnalyzedUrls = options.maxAnalyzedUrls ?? DEFAULT_MAX_ANALYZED_URLS;
  }

  async loadPortalHistory(): Promise<ReferenceItem[]> {
    const items = await this.loadList(STATE_KEYS.portalHistory, ReferenceItemSchema);
    return this.uniqueByUrl(STATE_KEYS.portalHistory, items);
  }

  savePortalHistory(items: readonly ReferenceItem[]): Promise<void> {
    return this.save(STATE_KEYS.portalHistory, items);
  }

  async loadAggregatorHistory(): Promise<MatchRecord[]> {
    const records = await this.loadList(STATE_KEYS.aggregatorHistory, MatchRecordSchema);
    return this.uniqueByUrl(STATE_KEYS.aggregatorHistory, records);
  }

  saveAggregatorHistory(records: readonly MatchRecord[]): Promise<void> {
    return this.save(STATE_KEYS.aggregatorHistory, records);
  }

  async loadAnalyzedUrls(): Promise<AnalyzedUrlSet> {
    const urls = await this.loadList(STATE_KEYS.analyzedUrls, z.string().min(1));
    return new AnalyzedUrlSet(urls, this.maxAnalyzedUrls);
  }

  saveAnalyzedUrls(urls: AnalyzedUrlSet): Promise<void> {
    return this.save(STATE_KEYS.analyzedUrls, urls.toArray());
  }

  /**
   * Cache snapshot, or null when absent or unreadable as a snapshot.
   */
  async loadCacheSnapshot(): Promise<CacheSnapshot | null> {
    const raw = await this.read(STATE_KEYS.embeddingCache);
    if (raw === null) return null;

    const parsed = CacheSnapshotSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.log.warn('Ignoring invalid embedding cache snapshot', {
        issues: parsed.error.issues.length,
      });
      return null;
    }
    return parsed.data;
  }

  saveCacheSnapshot(snapshot: CacheSnapshot): Promise<void> {
    return this.save(STATE_KEYS.embeddingCache, snapshot);
  }

  // ============ internals ============

  private async read(key: StateKey): Promise<string | null> {
    try {
      return await this.store.read(key);
    } catch (error) {
      throw new PersistenceError(key, error);
    }
  }

  private async loadList<S extends z.ZodTypeAny>(key: StateKey, schema: S): Promise<z.output<S>[]> {
    const raw = await this.read(key);
    if (raw === null) return [];

    const data = parseJson(raw);
    if (!Array.isArray(data)) {
      this.log.warn('State document is not a list, starting empty', { key });
      return [];
    }

    const items: z.output<S>[] = [];
    let dropped = 0;
    for (const entry of data) {
      const parsed = schema.safeParse(entry);
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      this.log.warn('Dropped invalid state entries', { key, dropped, kept: items.length });
    }
    return items;
  }

  /**
   * First entry wins. Older documents can hold several spellings of one URL
   * that normalize to the same value on load.
   */
  private uniqueByUrl<T extends { url: string }>(key: StateKey, items: T[]): T[] {
    const seen = new Set<string>();
    const unique = items.filter((item) => {
      if (seen.has(item.url)) return false;
      seen.add(item.url);
      return true;
    });

    const duplicates = items.length - unique.length;
    if (duplicates > 0) {
      this.log.warn('Dropped duplicate state entries', { key, duplicates, kept: unique.length });
    }
    return unique;
  }

  private async save(key: StateKey, value: unknown): Promise<void> {
    try {
      await this.store.write(key, JSON.stringify(value, null, 2));
      this.log.debug('State saved', { key });
    } catch (error) {
      this.log.error('State save failed', { key, error: errorMessage(error) });
      throw new PersistenceError(key, error);
    }
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
