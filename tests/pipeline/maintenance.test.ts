/**
 * Tests for embedding cache maintenance
 */

import { describe, it, expect } from 'vitest';
import { EmbeddingCache } from '../../src/matching/embedding-cache';
import type { ReferenceEmbeddings } from '../../src/matching/scorer';
import { CacheMaintenance, collectKeepUrls, pruneCaches } from '../../src/pipeline/maintenance';
import type { Vector } from '../../src/providers/embeddings';
import { makeRecord, makeReference } from '../helpers';

const DAY = 24 * 60 * 60 * 1000;

function createCaches(clock: { now: number }) {
  return {
    candidate: new EmbeddingCache<Vector>({ capacity: 10, now: () => clock.now }),
    reference: new EmbeddingCache<ReferenceEmbeddings>({ capacity: 10, now: () => clock.now }),
  };
}

const EMPTY_REFERENCE: ReferenceEmbeddings = { title: [1], titleSnippet: [1], snippet: [0] };

describe('collectKeepUrls', () => {
  it('should collect portal URLs, aggregator URLs and matched sources', () => {
    const keep = collectKeepUrls(
      [makeReference({ url: 'https://www.mos.ru/news/item/1/' })],
      [makeRecord({ url: 'https://dzen.ru/a/1', sourceUrl: 'https://www.mos.ru/news/item/9/' })]
    );

    expect(keep).toEqual(
      new Set(['https://www.mos.ru/news/item/1/', 'https://dzen.ru/a/1', 'https://www.mos.ru/news/item/9/'])
    );
  });
});

describe('pruneCaches', () => {
  it('should drop old entries no longer referenced by history', () => {
    const clock = { now: 0 };
    const caches = createCaches(clock);
    caches.candidate.put('https://dzen.ru/a/old', [1]);
    caches.candidate.put('https://dzen.ru/a/kept', [1]);
    caches.reference.put('https://www.mos.ru/news/item/old/', EMPTY_REFERENCE);
    clock.now = 4 * DAY;
    caches.candidate.put('https://dzen.ru/a/new', [1]);

    const report = pruneCaches(caches, new Set(['https://dzen.ru/a/kept']), 3);

    expect(report.candidate).toEqual({ before: 3, after: 2, removed: 1 });
    expect(report.reference).toEqual({ before: 1, after: 0, removed: 1 });
    expect(caches.candidate.has('https://dzen.ru/a/kept')).toBe(true);
  });
});

describe('CacheMaintenance', () => {
  it('should prune on the first call and then at most once per interval', () => {
    const caches = createCaches({ now: 0 });
    const maintenance = new CacheMaintenance(caches, 3, DAY);
    const start = new Date('2024-03-10T00:00:00.000Z');

    expect(maintenance.pruneIfDue(start, [], [])).not.toBeNull();
    expect(maintenance.pruneIfDue(new Date(start.getTime() + DAY - 1), [], [])).toBeNull();
    expect(maintenance.pruneIfDue(new Date(start.getTime() + DAY), [], [])).not.toBeNull();
    expect(maintenance.lastRun?.getTime()).toBe(start.getTime() + DAY);
  });
});
