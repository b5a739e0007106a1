/**
 * NewsRelay — Matcher
 *
 * Classifies aggregator candidates against the portal reference pool:
 *
 * 1. Skip what was already analyzed or recorded
 * 2. Detect renames (same headline, new URL) and rewrite the record in place
 * 3. Semantic match: best reference scoring >= threshold, unless the source
 *    is already claimed by a stronger match
 * 4. Keyword fallback: a topic phrase inside the headline
 * 5. Otherwise remember the URL as analyzed and move on
 */

import { logger } from '../lib/logger';
import type { CandidateItem, MatchRecord, ReferenceItem } from '../types/news';
import { MAX_RECORDED_KEYWORDS, type KeywordMatcher } from './keywords';
import type { Scorer } from './scorer';
import { countCommonWords, normalizeText } from './text';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================
// TYPES
// ============================================================

export interface BestMatch {
  reference: ReferenceItem | null;
  score: number;
}

export interface RenameUpdate {
  previousUrl: string;
  url: string;
  title: string;
  addedAt: string;
}

export interface UrlLookup {
  has(url: string): boolean;
}

export interface EvaluationContext {
  /** Portal items eligible as sources */
  pool: readonly ReferenceItem[];
  /** Aggregator records persisted by earlier cycles */
  history: readonly MatchRecord[];
  analyzed: UrlLookup;
  now?: Date;
}

export interface EvaluationStats {
  found: number;
  alreadyAnalyzed: number;
  alreadyKnown: number;
  renamed: number;
  semantic: number;
  keyword: number;
  claimRejected: number;
  filtered: number;
}

export interface EvaluationResult {
  accepted: MatchRecord[];
  renames: RenameUpdate[];
  /** Every URL evaluated this pass, to add to the analyzed set */
  analyzedUrls: string[];
  stats: EvaluationStats;
}

export interface MatcherOptions {
  scorer: Scorer;
  keywords: KeywordMatcher;
  similarityThreshold?: number;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.79;

// ============================================================
// BUILDING BLOCKS
// ============================================================

/**
 * Highest-scoring reference. Strictly greater wins, so ties keep the first
 * item seen and a pool scoring 0 everywhere yields no reference.
 */
export async function findBestMatch(
  candidate: CandidateItem,
  pool: readonly ReferenceItem[],
  scorer: Scorer
): Promise<BestMatch> {
  let reference: ReferenceItem | null = null;
  let best = 0;

  for (const item of pool) {
    const score = await scorer.score(candidate, item);
    if (score > best) {
      best = score;
      reference = item;
    }
  }

  return { reference, score: best };
}

/**
 * True when a persisted semantic match already points at `sourceUrl` with a
 * strictly higher score. Weaker persisted claims are left in place.
 */
export function isClaimedByStrongerMatch(
  sourceUrl: string,
  score: number,
  history: readonly MatchRecord[]
): boolean {
  return history.some(
    (record) =>
      record.matchType === 'semantic' &&
      record.sourceUrl === sourceUrl &&
      score < (record.similarityScore ?? 0)
  );
}

/**
 * Portal items no older than `maxAgeDays` whole days.
 * Items with an unreadable timestamp are left out.
 */
export function buildReferencePool(
  items: readonly ReferenceItem[],
  maxAgeDays: number,
  now: Date = new Date()
): ReferenceItem[] {
  const seen = new Set<string>();
  const pool: ReferenceItem[] = [];

  for (const item of items) {
    const addedAt = Date.parse(item.addedAt);
    if (Number.isNaN(addedAt)) continue;
    const ageDays = Math.floor((now.getTime() - addedAt) / DAY_MS);
    if (ageDays > maxAgeDays || seen.has(item.url)) continue;
    seen.add(item.url);
    pool.push(item);
  }

  return pool;
}

// ============================================================
// MATCHER
// ============================================================

interface SemanticCandidate {
  candidate: CandidateItem;
  reference: ReferenceItem;
  score: number;
}

export class Matcher {
  readonly similarityThreshold: number;
  private readonly scorer: Scorer;
  private readonly keywords: KeywordMatcher;
  private readonly log = logger.child({ component: 'matcher' });

  constructor(options: MatcherOptions) {
    this.scorer = options.scorer;
    this.keywords = options.keywords;
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  }

  async evaluate(
    candidates: readonly CandidateItem[],
    context: EvaluationContext
  ): Promise<EvaluationResult> {
    const now = context.now ?? new Date();
    const nowIso = now.toISOString();
    const stats: EvaluationStats = {
      found: candidates.length,
      alreadyAnalyzed: 0,
      alreadyKnown: 0,
      renamed: 0,
      semantic: 0,
      keyword: 0,
      claimRejected: 0,
      filtered: 0,
    };

    const historyUrls = new Set(context.history.map((r) => r.url));
    const urlByTitle = new Map<string, string>();
    for (const record of context.history) {
      urlByTitle.set(normalizeText(record.title), record.url);
    }

    const seenUrls = new Set<string>();
    const seenTitles = new Set<string>();
    const analyzedUrls: string[] = [];
    const renames: RenameUpdate[] = [];
    const semantic: SemanticCandidate[] = [];
    const keywordRecords: MatchRecord[] = [];

    for (const candidate of candidates) {
      const url = candidate.url.trim();
      const title = candidate.title.trim();
      if (!url || !title || seenUrls.has(url)) continue;
      seenUrls.add(url);

      if (context.analyzed.has(url)) {
        stats.alreadyAnalyzed++;
        continue;
      }

      const normalizedTitle = normalizeText(title);
      const knownUrl = urlByTitle.get(normalizedTitle);
      if (knownUrl !== undefined) {
        if (knownUrl !== url) {
          renames.push({ previousUrl: knownUrl, url, title, addedAt: nowIso });
          urlByTitle.set(normalizedTitle, url);
          historyUrls.add(url);
          analyzedUrls.push(url);
          stats.renamed++;
          this.log.info('Aggregator item re-published under a new URL', { previousUrl: knownUrl, url });
        } else {
          stats.alreadyKnown++;
        }
        continue;
      }

      if (historyUrls.has(url)) {
        stats.alreadyKnown++;
        continue;
      }

      // Same headline twice in one fetch: keep the first
      if (seenTitles.has(normalizedTitle)) {
        analyzedUrls.push(url);
        stats.filtered++;
        continue;
      }
      seenTitles.add(normalizedTitle);

      const item: CandidateItem = { url, title };
      analyzedUrls.push(url);

      const best = await findBestMatch(item, context.pool, this.scorer);
      if (best.reference && best.score >= this.similarityThreshold) {
        if (isClaimedByStrongerMatch(best.reference.url, best.score, context.history)) {
          stats.claimRejected++;
          this.log.info('Source already claimed by a stronger match', {
            url,
            sourceUrl: best.reference.url,
            score: best.score,
          });
          continue;
        }
        semantic.push({ candidate: item, reference: best.reference, score: best.score });
        continue;
      }

      const matched = this.keywords.matchesIn(title);
      if (matched.length > 0) {
        keywordRecords.push({
          url,
          title,
          addedAt: nowIso,
          matchType: 'keyword',
          matchedKeywords: matched.slice(0, MAX_RECORDED_KEYWORDS),
        });
        stats.keyword++;
        this.log.info('Keyword match', { title, keywords: matched.slice(0, 3) });
        continue;
      }

      stats.filtered++;
    }

    const winners = strongestClaimPerSource(semantic);
    stats.claimRejected += semantic.length - winners.length;
    stats.semantic = winners.length;

    const semanticRecords: MatchRecord[] = winners.map(({ candidate, reference, score }) => {
      this.log.info('Source found for aggregator item', {
        title: candidate.title,
        sourceUrl: reference.url,
        score: Math.round(score * 1000) / 1000,
      });
      return {
        url: candidate.url,
        title: candidate.title,
        addedAt: nowIso,
        sourceUrl: reference.url,
        sourceTitle: reference.title,
        sourceSnippet: reference.snippet,
        matchType: 'semantic',
        similarityScore: score,
        commonWordCount: countCommonWords(candidate.title, reference.title),
        matchedKeywords: [],
      };
    });

    const order = new Map(candidates.map((c, i) => [c.url.trim(), i]));
    const accepted = [...semanticRecords, ...keywordRecords].sort(
      (a, b) => (order.get(a.url) ?? 0) - (order.get(b.url) ?? 0)
    );

    this.log.info('Aggregator evaluation finished', { ...stats });

    return { accepted, renames, analyzedUrls, stats };
  }
}

/**
 * One claim per source within a pass: the highest score, first seen on ties.
 */
function strongestClaimPerSource(claims: readonly SemanticCandidate[]): SemanticCandidate[] {
  const best = new Map<string, SemanticCandidate>();
  for (const claim of claims) {
    const current = best.get(claim.reference.url);
    if (!current || claim.score > current.score) {
      best.set(claim.reference.url, claim);
    }
  }
  const winners = new Set(best.values());
  return claims.filter((claim) => winners.has(claim));
}
