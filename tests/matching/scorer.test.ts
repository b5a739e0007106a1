/**
 * Tests for the similarity scorer
 *
 * Embeddings come from a fixed table so every score can be worked out by hand.
 */

import { describe, it, expect } from 'vitest';
import { EmbeddingCache } from '../../src/matching/embedding-cache';
import { KeywordMatcher } from '../../src/matching/keywords';
import { Matcher } from '../../src/matching/matcher';
import { SimilarityScorer, type ReferenceEmbeddings } from '../../src/matching/scorer';
import type { EmbeddingProvider, Vector } from '../../src/providers/embeddings';
import { makeReference } from '../helpers';

class TableProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(private readonly vectors: Record<string, Vector>) {}

  async embed(text: string): Promise<Vector> {
    this.calls.push(text);
    const vector = this.vectors[text];
    if (!vector) throw new Error(`no vector for "${text}"`);
    return vector;
  }
}

function createScorer(vectors: Record<string, Vector>, phrases: string[] = ['поликлиника']) {
  const provider = new TableProvider(vectors);
  const scorer = new SimilarityScorer({
    provider,
    keywords: new KeywordMatcher(phrases),
    candidateCache: new EmbeddingCache<Vector>({ capacity: 10 }),
    referenceCache: new EmbeddingCache<ReferenceEmbeddings>({ capacity: 10 }),
  });
  return { provider, scorer };
}

const CANDIDATE_URL = 'https://dzen.ru/a/1';
const REFERENCE_URL = 'https://www.mos.ru/news/item/1/';

describe('SimilarityScorer', () => {
  it('should average title and title+snippet similarity without a bonus', async () => {
    const { scorer } = createScorer({
      'Погода на выходные': [1, 0],
      'Мэр открыл парк': [0.6, 0.8],
      'Мэр открыл парк. В парке новые дорожки': [1, 0],
      'В парке новые дорожки': [0, 1],
    });

    const result = await scorer.explain(
      { url: CANDIDATE_URL, title: 'Погода на выходные' },
      { url: REFERENCE_URL, title: 'Мэр открыл парк', snippet: 'В парке новые дорожки' }
    );

    expect(result.titleSimilarity).toBeCloseTo(0.6, 6);
    expect(result.titleSnippetSimilarity).toBeCloseTo(1, 6);
    expect(result.baseScore).toBeCloseTo(0.8, 6);
    expect(result.bonusReason).toBe('none');
    expect(result.score).toBeCloseTo(0.8, 6);
  });

  it('should add the common-words bonus below the high-similarity cutoff', async () => {
    const { scorer } = createScorer({
      'Собянин сообщил об открытии поликлиники': [1, 0],
      'Собянин открыл поликлинику в Москве': [0.6, 0.8],
    });

    const result = await scorer.explain(
      { url: CANDIDATE_URL, title: 'Собянин сообщил об открытии поликлиники' },
      { url: REFERENCE_URL, title: 'Собянин открыл поликлинику в Москве' }
    );

    expect(result.commonWords).toBe(3);
    expect(result.baseScore).toBeCloseTo(0.6, 6);
    expect(result.bonus).toBe(0.15);
    expect(result.bonusReason).toBe('common_words');
    expect(result.score).toBeCloseTo(0.69, 6);
  });

  it('should use the smaller bonus for high-similarity pairs', async () => {
    const { scorer } = createScorer({
      'Собянин сообщил об открытии поликлиники': [1, 0],
      'Собянин открыл поликлинику в Москве': [0.8, 0.6],
    });

    const result = await scorer.explain(
      { url: CANDIDATE_URL, title: 'Собянин сообщил об открытии поликлиники' },
      { url: REFERENCE_URL, title: 'Собянин открыл поликлинику в Москве' }
    );

    expect(result.bonusReason).toBe('common_words_high_similarity');
    expect(result.score).toBeCloseTo(0.88, 6);
  });

  it('should add the keyword bonus when both titles share a topic word', async () => {
    const { scorer } = createScorer(
      {
        'Врач рассказал о профилактике гриппа': [1, 0],
        'Каждый врач пройдет обучение': [0.8, 0.6],
      },
      ['врач']
    );

    const result = await scorer.explain(
      { url: CANDIDATE_URL, title: 'Врач рассказал о профилактике гриппа' },
      { url: REFERENCE_URL, title: 'Каждый врач пройдет обучение' }
    );

    expect(result.commonWords).toBe(1);
    expect(result.sharedPhrase).toBe('врач');
    expect(result.bonusReason).toBe('keyword_phrase');
    expect(result.score).toBeCloseTo(0.92, 6);
  });

  it('should clamp the final score to 1', async () => {
    const { scorer } = createScorer({
      'Собянин сообщил об открытии поликлиники': [1, 0],
      'Собянин открыл поликлинику в Москве': [1, 0],
    });

    const score = await scorer.score(
      { url: CANDIDATE_URL, title: 'Собянин сообщил об открытии поликлиники' },
      { url: REFERENCE_URL, title: 'Собянин открыл поликлинику в Москве' }
    );

    expect(score).toBe(1);
  });

  it('should score 0 when an embedding cannot be computed', async () => {
    const { scorer } = createScorer({ 'Мэр открыл парк': [1, 0] });

    const score = await scorer.score(
      { url: CANDIDATE_URL, title: 'Неизвестный заголовок' },
      { url: REFERENCE_URL, title: 'Мэр открыл парк' }
    );

    expect(score).toBe(0);
  });

  it('should embed each candidate and reference only once', async () => {
    const { scorer, provider } = createScorer({
      'Погода на выходные': [1, 0],
      'Мэр открыл парк': [0.6, 0.8],
      'Мэр открыл парк. В парке новые дорожки': [1, 0],
      'В парке новые дорожки': [0, 1],
      'Новый сквер': [0, 1],
    });
    const candidate = { url: CANDIDATE_URL, title: 'Погода на выходные' };
    const park = { url: REFERENCE_URL, title: 'Мэр открыл парк', snippet: 'В парке новые дорожки' };
    const square = { url: 'https://www.mos.ru/news/item/2/', title: 'Новый сквер' };

    await scorer.score(candidate, park);
    await scorer.score(candidate, square);
    await scorer.score(candidate, park);

    expect(provider.calls).toEqual([
      'Погода на выходные',
      'Мэр открыл парк',
      'Мэр открыл парк. В парке новые дорожки',
      'В парке новые дорожки',
      'Новый сквер',
    ]);
    expect(scorer.referenceCache.get(square.url)?.snippet).toEqual([0, 0]);
  });
});

describe('SimilarityScorer with Matcher', () => {
  it('should accept a retold clinic opening on the common-words bonus alone', async () => {
    const reference = makeReference({
      url: REFERENCE_URL,
      title: 'Открылась новая поликлиника в Москве',
      snippet: 'Она примет до 750 пациентов в день.',
      addedAt: '2024-03-10T08:00:00.000Z',
    });
    const candidate = { url: CANDIDATE_URL, title: 'В Москве открылась поликлиника' };
    // cos = 20/29 for both reference vectors: base just under the 0.7 cutoff
    const { scorer } = createScorer({
      'В Москве открылась поликлиника': [1, 0],
      'Открылась новая поликлиника в Москве': [20, 21],
      'Открылась новая поликлиника в Москве. Она примет до 750 пациентов в день.': [20, 21],
      'Она примет до 750 пациентов в день.': [0, 1],
    });
    const matcher = new Matcher({ scorer, keywords: new KeywordMatcher(['поликлиника']) });

    const breakdown = await scorer.explain(candidate, reference);
    const result = await matcher.evaluate([candidate], {
      pool: [reference],
      history: [],
      analyzed: new Set<string>(),
      now: new Date('2024-03-10T12:00:00.000Z'),
    });

    expect(breakdown.commonWords).toBe(3);
    expect(breakdown.baseScore).toBeCloseTo(20 / 29, 6);
    expect(breakdown.bonus).toBe(0.15);
    expect(breakdown.bonusReason).toBe('common_words');
    expect(breakdown.score).toBeCloseTo((20 / 29) * 1.15, 6);
    expect(result.accepted).toHaveLength(1);
    expect(result.accepted[0]).toMatchObject({
      url: CANDIDATE_URL,
      matchType: 'semantic',
      sourceUrl: REFERENCE_URL,
      commonWordCount: 3,
    });
    expect(result.accepted[0]?.similarityScore).toBeCloseTo((20 / 29) * 1.15, 6);
  });
});
