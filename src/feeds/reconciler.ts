/**
 * NewsRelay — History Reconciler
 *
 * Pure merge of one cycle's results into persisted history. Computes what
 * to write and what to deliver; performs no I/O, so a cycle either writes
 * a fully merged state or nothing.
 *
 * Reconciling the same inputs against its own output is a no-op:
 * nothing new, nothing changed.
 */

import type { RenameUpdate } from '../matching/matcher';
import type { MatchRecord, PortalArticle, ReferenceItem } from '../types/news';
import { normalizePortalUrl } from './url';

export interface ReconcileInput {
  fetchedPortal: readonly PortalArticle[];
  portalHistory: readonly ReferenceItem[];
  aggregatorMatches: readonly MatchRecord[];
  aggregatorHistory: readonly MatchRecord[];
  renames?: readonly RenameUpdate[];
  now?: Date;
}

export interface ReconcileResult {
  /** Full portal history to persist */
  portalHistory: ReferenceItem[];
  /** Full aggregator history to persist */
  aggregatorHistory: MatchRecord[];
  newPortalItems: ReferenceItem[];
  newAggregatorItems: MatchRecord[];
  /** Persisted portal URLs whose inTargetFeed flipped to true */
  updatedPortalFlags: string[];
  appliedRenames: RenameUpdate[];
  portalChanged: boolean;
  aggregatorChanged: boolean;
}

/**
 * Fetched portal articles not yet in history, as reference items.
 * Duplicates within the fetch collapse to the first occurrence.
 */
export function newPortalItems(
  fetched: readonly PortalArticle[],
  history: readonly ReferenceItem[],
  now: Date = new Date()
): ReferenceItem[] {
  const known = new Set(history.map((item) => normalizePortalUrl(item.url)));
  const addedAt = now.toISOString();
  const items: ReferenceItem[] = [];

  for (const article of fetched) {
    const url = normalizePortalUrl(article.url);
    if (!url || known.has(url)) continue;
    known.add(url);
    items.push({
      url,
      title: article.title,
      snippet: article.snippet,
      addedAt,
      inTargetFeed: false,
    });
  }

  return items;
}

export function reconcileHistory(input: ReconcileInput): ReconcileResult {
  const now = input.now ?? new Date();

  // Aggregator: only URLs not yet recorded are new
  const aggregatorUrls = new Set(input.aggregatorHistory.map((r) => r.url));
  const newAggregatorItems: MatchRecord[] = [];
  for (const record of input.aggregatorMatches) {
    if (aggregatorUrls.has(record.url)) continue;
    aggregatorUrls.add(record.url);
    newAggregatorItems.push(record);
  }

  // Renames rewrite url and addedAt in place, never into a URL already taken
  const appliedRenames: RenameUpdate[] = [];
  let aggregatorHistory = input.aggregatorHistory.map((record) => ({ ...record }));
  for (const rename of input.renames ?? []) {
    if (aggregatorUrls.has(rename.url)) continue;
    const index = aggregatorHistory.findIndex((r) => r.url === rename.previousUrl);
    const current = aggregatorHistory[index];
    if (index === -1 || !current) continue;
    aggregatorHistory[index] = { ...current, url: rename.url, addedAt: rename.addedAt };
    aggregatorUrls.delete(rename.previousUrl);
    aggregatorUrls.add(rename.url);
    appliedRenames.push(rename);
  }
  aggregatorHistory = [...aggregatorHistory, ...newAggregatorItems];

  // Portal: new items, then inTargetFeed flips for sources of new matches
  const claimedSources = new Set(
    newAggregatorItems.flatMap((r) => (r.matchType === 'semantic' && r.sourceUrl ? [r.sourceUrl] : []))
  );

  const updatedPortalFlags: string[] = [];
  const portalHistory = input.portalHistory.map((item) => {
    if (!item.inTargetFeed && claimedSources.has(item.url)) {
      updatedPortalFlags.push(item.url);
      return { ...item, inTargetFeed: true };
    }
    return { ...item };
  });

  const freshPortal = newPortalItems(input.fetchedPortal, input.portalHistory, now).map((item) =>
    claimedSources.has(item.url) ? { ...item, inTargetFeed: true } : item
  );

  return {
    portalHistory: [...portalHistory, ...freshPortal],
    aggregatorHistory,
    newPortalItems: freshPortal,
    newAggregatorItems,
    updatedPortalFlags,
    appliedRenames,
    portalChanged: freshPortal.length > 0 || updatedPortalFlags.length > 0,
    aggregatorChanged: newAggregatorItems.length > 0 || appliedRenames.length > 0,
  };
}
