/**
 * NewsRelay — Control Server Tests
 *
 * Tests for:
 * - Bearer token verification
 * - Health, stats, fetch and scheduler endpoints
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import request from 'supertest';
import { EmbeddingCache } from '../../src/matching/embedding-cache';
import { KeywordMatcher } from '../../src/matching/keywords';
import { Matcher } from '../../src/matching/matcher';
import type { ReferenceEmbeddings } from '../../src/matching/scorer';
import { NewsMonitor } from '../../src/pipeline/cycle';
import { Scheduler } from '../../src/pipeline/scheduler';
import type { Vector } from '../../src/providers/embeddings';
import { createControlApp, verifyBearerToken } from '../../src/server/control';
import { STATE_KEYS, StateRepository } from '../../src/storage/repository';
import type { CandidateItem, PortalArticle } from '../../src/types/news';
import { MemoryBlobStore, RecordingSink, StaticSource, TableScorer } from '../helpers';

const TOKEN = 'test-secret';

function createApp() {
  const store = new MemoryBlobStore();
  store.docs.set(
    STATE_KEYS.aggregatorHistory,
    JSON.stringify([
      { url: 'https://dzen.ru/a/1', title: 'Один', sourceUrl: 'https://www.mos.ru/news/item/1/', similarityScore: 0.9 },
      { url: 'https://dzen.ru/a/2', title: 'Два', matchedKeywords: ['врач'] },
    ])
  );
  store.docs.set(STATE_KEYS.analyzedUrls, JSON.stringify(['https://dzen.ru/a/1', 'https://dzen.ru/a/2']));

  const monitor = new NewsMonitor({
    portalSource: new StaticSource<PortalArticle>('portal', [
      { url: 'https://www.mos.ru/news/item/5/', title: 'Новость портала' },
    ]),
    aggregatorSource: new StaticSource<CandidateItem>('aggregator', []),
    matcher: new Matcher({ scorer: new TableScorer({}), keywords: new KeywordMatcher([]) }),
    repository: new StateRepository(store),
    sink: new RecordingSink(),
    caches: {
      candidate: new EmbeddingCache<Vector>({ capacity: 10 }),
      reference: new EmbeddingCache<ReferenceEmbeddings>({ capacity: 10 }),
    },
    options: { maxNewsAgeDays: 2, cacheMaxAgeDays: 3, snapshotCache: false },
  });
  const task = vi.fn(async () => undefined);
  const scheduler = new Scheduler(task, { timezone: 'Europe/Moscow' });

  return { app: createControlApp({ monitor, scheduler, token: TOKEN }), scheduler, task };
}

// ============================================================
// TOKEN VERIFICATION TESTS
// ============================================================

describe('verifyBearerToken', () => {
  it('should accept the matching token', () => {
    expect(verifyBearerToken(`Bearer ${TOKEN}`, TOKEN)).toBe(true);
  });

  it('should reject missing, malformed and wrong tokens', () => {
    expect(verifyBearerToken(undefined, TOKEN)).toBe(false);
    expect(verifyBearerToken(TOKEN, TOKEN)).toBe(false);
    expect(verifyBearerToken('Bearer wrong-secret', TOKEN)).toBe(false);
    expect(verifyBearerToken('Bearer test', TOKEN)).toBe(false);
  });
});

// ============================================================
// ENDPOINT TESTS
// ============================================================

describe('control server', () => {
  let stopScheduler: (() => void) | null = null;

  afterEach(() => {
    stopScheduler?.();
    stopScheduler = null;
  });

  it('should answer /health without a token', async () => {
    const { app } = createApp();

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.service).toBe('newsrelay-control');
  });

  it('should require the token elsewhere', async () => {
    const { app } = createApp();

    const res = await request(app).get('/stats');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Unauthorized' });
  });

  it('should report history and cache statistics', async () => {
    const { app } = createApp();

    const res = await request(app).get('/stats').set('Authorization', `Bearer ${TOKEN}`);

    expect(res.status).toBe(200);
    expect(res.body.portal).toEqual({ total: 0, inTargetFeed: 0 });
    expect(res.body.aggregator).toEqual({ total: 2, semantic: 1, keyword: 1 });
    expect(res.body.analyzedUrls).toBe(2);
    expect(res.body.caches.candidate.size).toBe(0);
    expect(res.body.scheduler).toEqual({ running: false, nextRunAt: null });
    expect(res.body.cycle).toEqual({ inProgress: false, last: null });
  });

  it('should run a cycle on demand', async () => {
    const { app } = createApp();

    const res = await request(app).post('/fetch').set('Authorization', `Bearer ${TOKEN}`);

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.portalNew).toBe(1);
    expect(res.body.sent).toBe(1);
  });

  it('should start and stop the scheduler once each', async () => {
    const { app, scheduler } = createApp();
    stopScheduler = () => scheduler.stop();
    const auth = `Bearer ${TOKEN}`;

    const started = await request(app).post('/scheduler/start').set('Authorization', auth);
    expect(started.status).toBe(200);
    expect(started.body.running).toBe(true);

    const again = await request(app).post('/scheduler/start').set('Authorization', auth);
    expect(again.status).toBe(409);

    const stopped = await request(app).post('/scheduler/stop').set('Authorization', auth);
    expect(stopped.status).toBe(200);
    expect(stopped.body.running).toBe(false);

    const stoppedAgain = await request(app).post('/scheduler/stop').set('Authorization', auth);
    expect(stoppedAgain.status).toBe(409);
  });
});
