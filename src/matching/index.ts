/**
 * NewsRelay — Matching Engine
 *
 * Aggregator fetch plus classification against the portal pool:
 * 1. Fetch aggregator cards (failures yield zero candidates)
 * 2. Skip analyzed and recorded URLs, detect renames
 * 3. Semantic match with prior-claim tie-break
 * 4. Keyword fallback
 */

import type { NewsSource, SourceFetchResult } from '../feeds/base';
import { logger } from '../lib/logger';
import type { CandidateItem } from '../types/news';
import type { EvaluationContext, EvaluationResult, Matcher } from './matcher';

export * from './embedding-cache';
export * from './keywords';
export * from './matcher';
export * from './scorer';
export * from './text';

export interface AggregatorCollection extends EvaluationResult {
  fetch: SourceFetchResult<CandidateItem>;
}

/**
 * Fetch the aggregator and classify every card.
 */
export async function collectAggregatorMatches(
  source: NewsSource<CandidateItem>,
  matcher: Matcher,
  context: EvaluationContext
): Promise<AggregatorCollection> {
  const fetch = await source.safeFetch();

  const result = await matcher.evaluate(fetch.items, context);

  logger.info('Aggregator matching complete', {
    found: fetch.items.length,
    accepted: result.accepted.length,
    renamed: result.renames.length,
    poolSize: context.pool.length,
  });

  return { fetch, ...result };
}
