/**
 * NewsRelay — Similarity Scorer
 *
 * Scores how likely an aggregator headline is a retelling of a portal article.
 *
 * score = min(avg(cos(candidate, title), cos(candidate, title + snippet)) * (1 + bonus), 1)
 *
 * The bonus recovers near-duplicates phrased unusually: enough shared stems
 * (reporting verbs excluded), or a topic phrase present in both titles.
 */

import type { ScorerSettings } from '../lib/config';
import { errorMessage, logger } from '../lib/logger';
import type { CandidateItem, ReferenceItem } from '../types/news';
import { cosineSimilarity, zeroVector, type EmbeddingProvider, type Vector } from '../providers/embeddings';
import type { EmbeddingCache } from './embedding-cache';
import type { KeywordMatcher } from './keywords';
import { countCommonWords } from './text';

// ============================================================
// TYPES
// ============================================================

export interface ReferenceEmbeddings {
  title: Vector;
  titleSnippet: Vector;
  snippet: Vector;
}

export type ScoringReference = Pick<ReferenceItem, 'url' | 'title' | 'snippet'>;

export type BonusReason = 'common_words' | 'common_words_high_similarity' | 'keyword_phrase' | 'none';

export interface ScoreBreakdown {
  titleSimilarity: number;
  titleSnippetSimilarity: number;
  baseScore: number;
  commonWords: number;
  sharedPhrase: string | null;
  bonus: number;
  bonusReason: BonusReason;
  score: number;
}

/**
 * Anything that can rank a candidate against a reference.
 * The matcher depends on this, not on the embedding machinery.
 */
export interface Scorer {
  score(candidate: CandidateItem, reference: ScoringReference): Promise<number>;
}

export interface SimilarityScorerDeps {
  provider: EmbeddingProvider;
  keywords: KeywordMatcher;
  candidateCache: EmbeddingCache<Vector>;
  referenceCache: EmbeddingCache<ReferenceEmbeddings>;
  settings?: Partial<ScorerSettings>;
}

export const DEFAULT_SCORER_SETTINGS: ScorerSettings = {
  minCommonWords: 3,
  highSimilarityCutoff: 0.7,
  highSimilarityBonus: 0.1,
  commonWordsBonus: 0.15,
  keywordPhraseBonus: 0.15,
};

// ============================================================
// SCORER
// ============================================================

export class SimilarityScorer implements Scorer {
  readonly candidateCache: EmbeddingCache<Vector>;
  readonly referenceCache: EmbeddingCache<ReferenceEmbeddings>;
  private readonly provider: EmbeddingProvider;
  private readonly keywords: KeywordMatcher;
  private readonly settings: ScorerSettings;
  private readonly log = logger.child({ component: 'scorer' });

  constructor(deps: SimilarityScorerDeps) {
    this.provider = deps.provider;
    this.keywords = deps.keywords;
    this.candidateCache = deps.candidateCache;
    this.referenceCache = deps.referenceCache;
    this.settings = { ...DEFAULT_SCORER_SETTINGS, ...deps.settings };
  }

  /**
   * Final score in [0, 1]. Embedding failures score 0 for this pair only.
   */
  async score(candidate: CandidateItem, reference: ScoringReference): Promise<number> {
    try {
      return (await this.explain(candidate, reference)).score;
    } catch (error) {
      this.log.error('Similarity scoring failed', {
        candidate: candidate.url,
        reference: reference.url,
        error: errorMessage(error),
      });
      return 0;
    }
  }

  /**
   * Full breakdown. Throws if an embedding cannot be computed.
   */
  async explain(candidate: CandidateItem, reference: ScoringReference): Promise<ScoreBreakdown> {
    const candidateVector = await this.candidateEmbedding(candidate);
    const referenceVectors = await this.referenceEmbeddings(reference);

    const titleSimilarity = cosineSimilarity(candidateVector, referenceVectors.title);
    const titleSnippetSimilarity = cosineSimilarity(candidateVector, referenceVectors.titleSnippet);
    const baseScore = (titleSimilarity + titleSnippetSimilarity) / 2;

    const commonWords = countCommonWords(candidate.title, reference.title);
    const sharedPhrase = this.keywords.sharedPhrase(candidate.title, reference.title);
    const { bonus, bonusReason } = this.bonusFor(baseScore, commonWords, sharedPhrase);

    const score = Math.max(0, Math.min(baseScore * (1 + bonus), 1));

    this.log.debug('Scored pair', {
      candidate: candidate.title,
      reference: reference.title,
      title: round(titleSimilarity),
      titleSnippet: round(titleSnippetSimilarity),
      base: round(baseScore),
      commonWords,
      sharedPhrase,
      bonus,
      score: round(score),
    });

    return {
      titleSimilarity,
      titleSnippetSimilarity,
      baseScore,
      commonWords,
      sharedPhrase,
      bonus,
      bonusReason,
      score,
    };
  }

  private bonusFor(
    baseScore: number,
    commonWords: number,
    sharedPhrase: string | null
  ): { bonus: number; bonusReason: BonusReason } {
    const s = this.settings;
    if (commonWords >= s.minCommonWords) {
      return baseScore >= s.highSimilarityCutoff
        ? { bonus: s.highSimilarityBonus, bonusReason: 'common_words_high_similarity' }
        : { bonus: s.commonWordsBonus, bonusReason: 'common_words' };
    }
    if (sharedPhrase !== null) {
      return { bonus: s.keywordPhraseBonus, bonusReason: 'keyword_phrase' };
    }
    return { bonus: 0, bonusReason: 'none' };
  }

  private candidateEmbedding(candidate: CandidateItem): Promise<Vector> {
    return this.candidateCache.getOrCompute(candidate.url, () => this.provider.embed(candidate.title));
  }

  private referenceEmbeddings(reference: ScoringReference): Promise<ReferenceEmbeddings> {
    return this.referenceCache.getOrCompute(reference.url, async () => {
      const title = await this.provider.embed(reference.title);
      if (!reference.snippet) {
        return { title, titleSnippet: title, snippet: zeroVector(title.length) };
      }
      const titleSnippet = await this.provider.embed(`${reference.title}. ${reference.snippet}`);
      const snippet = await this.provider.embed(reference.snippet);
      return { title, titleSnippet, snippet };
    });
  }
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
