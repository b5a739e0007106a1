/**
 * NewsRelay — Cache Maintenance
 *
 * Age-based pruning of both embedding caches. URLs still referenced by
 * persisted history are kept regardless of age.
 */

import { logger } from '../lib/logger';
import type { CacheDescription, EmbeddingCache, PruneStats } from '../matching/embedding-cache';
import type { ReferenceEmbeddings } from '../matching/scorer';
import type { Vector } from '../providers/embeddings';
import type { MatchRecord, ReferenceItem } from '../types/news';

const DAY_MS = 24 * 60 * 60 * 1000;
export const PRUNE_INTERVAL_MS = DAY_MS;

export interface EmbeddingCaches {
  candidate: EmbeddingCache<Vector>;
  reference: EmbeddingCache<ReferenceEmbeddings>;
}

export interface CachePruneReport {
  candidate: PruneStats;
  reference: PruneStats;
  keptUrls: number;
}

/**
 * Every URL persisted history still refers to: portal articles, aggregator
 * items, and the portal sources those items were matched to.
 */
export function collectKeepUrls(
  portalHistory: readonly ReferenceItem[],
  aggregatorHistory: readonly MatchRecord[]
): Set<string> {
  const keep = new Set<string>();
  for (const item of portalHistory) keep.add(item.url);
  for (const record of aggregatorHistory) {
    keep.add(record.url);
    if (record.sourceUrl) keep.add(record.sourceUrl);
  }
  keep.delete('');
  return keep;
}

export function pruneCaches(
  caches: EmbeddingCaches,
  keepUrls: ReadonlySet<string>,
  maxAgeDays: number
): CachePruneReport {
  const maxAgeMs = maxAgeDays * DAY_MS;
  const report = {
    candidate: caches.candidate.prune(keepUrls, maxAgeMs),
    reference: caches.reference.prune(keepUrls, maxAgeMs),
    keptUrls: keepUrls.size,
  };
  logger.info('Embedding caches pruned', { ...report, maxAgeDays });
  return report;
}

export function describeCaches(
  caches: EmbeddingCaches,
  maxAgeDays: number
): { candidate: CacheDescription; reference: CacheDescription } {
  const maxAgeMs = maxAgeDays * DAY_MS;
  return {
    candidate: caches.candidate.describe(maxAgeMs),
    reference: caches.reference.describe(maxAgeMs),
  };
}

/**
 * Runs pruning at most once per interval. The first call always prunes.
 */
export class CacheMaintenance {
  private lastRunAt: number | null = null;

  constructor(
    private readonly caches: EmbeddingCaches,
    private readonly maxAgeDays: number,
    private readonly intervalMs: number = PRUNE_INTERVAL_MS
  ) {}

  get lastRun(): Date | null {
    return this.lastRunAt === null ? null : new Date(this.lastRunAt);
  }

  pruneIfDue(
    now: Date,
    portalHistory: readonly ReferenceItem[],
    aggregatorHistory: readonly MatchRecord[]
  ): CachePruneReport | null {
    if (this.lastRunAt !== null && now.getTime() - this.lastRunAt < this.intervalMs) {
      return null;
    }
    this.lastRunAt = now.getTime();
    return pruneCaches(this.caches, collectKeepUrls(portalHistory, aggregatorHistory), this.maxAgeDays);
  }
}
