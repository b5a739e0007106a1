/**
 * NewsRelay — Monitoring Cycle
 *
 * One pass: load state → fetch portal → match aggregator → reconcile →
 * persist (write-on-change) → deliver.
 *
 * History is written before anything is sent. If that write fails nothing
 * is delivered, and the next cycle re-derives the same new items from the
 * last good state. Portal history is rolled back when the aggregator write
 * after it fails, so the pair lands together or not at all.
 */

import { nanoid } from 'nanoid';
import {
  aggregatorDeliverable,
  DEFAULT_LABELS,
  portalDeliverable,
  type MessageLabels,
} from '../delivery/messages';
import type { DeliverySink } from '../delivery/telegram';
import type { NewsSource } from '../feeds/base';
import { newPortalItems, reconcileHistory } from '../feeds/reconciler';
import { errorMessage, logger, type Logger } from '../lib/logger';
import { collectAggregatorMatches } from '../matching';
import { buildReferencePool, type Matcher } from '../matching/matcher';
import type { StateRepository } from '../storage/repository';
import type { CandidateItem, PortalArticle, ReferenceItem } from '../types/news';
import { CacheMaintenance, type EmbeddingCaches } from './maintenance';

// ============================================================
// TYPES
// ============================================================

export type CycleStatus = 'ok' | 'error' | 'skipped';

export interface CycleReport {
  cycleId: string;
  status: CycleStatus;
  startedAt: string;
  portalFound: number;
  portalNew: number;
  aggregatorFound: number;
  aggregatorNew: number;
  aggregatorSkipped: number;
  renamed: number;
  sent: number;
  durationMs: number;
  error?: string;
}

export interface MonitorOptions {
  maxNewsAgeDays: number;
  cacheMaxAgeDays: number;
  /** Persist embedding caches after every cycle */
  snapshotCache: boolean;
  /** Embedding model the cached vectors come from; snapshots of another model are ignored */
  embeddingModel?: string;
  labels?: MessageLabels;
}

export interface NewsMonitorDeps {
  portalSource: NewsSource<PortalArticle>;
  aggregatorSource: NewsSource<CandidateItem>;
  matcher: Matcher;
  repository: StateRepository;
  sink: DeliverySink;
  caches: EmbeddingCaches;
  options: MonitorOptions;
  now?: () => Date;
}

// ============================================================
// MONITOR
// ============================================================

export class NewsMonitor {
  readonly caches: EmbeddingCaches;
  readonly repository: StateRepository;
  private readonly deps: NewsMonitorDeps;
  private readonly maintenance: CacheMaintenance;
  private readonly now: () => Date;
  private running = false;
  private lastReport: CycleReport | null = null;

  constructor(deps: NewsMonitorDeps) {
    this.deps = deps;
    this.caches = deps.caches;
    this.repository = deps.repository;
    this.now = deps.now ?? (() => new Date());
    this.maintenance = new CacheMaintenance(deps.caches, deps.options.cacheMaxAgeDays);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get lastCycle(): CycleReport | null {
    return this.lastReport;
  }

  /**
   * Restore embedding caches from the last snapshot, if any.
   */
  async warmUp(): Promise<void> {
    try {
      const snapshot = await this.repository.loadCacheSnapshot();
      if (!snapshot) return;
      if (snapshot.model !== this.deps.options.embeddingModel) {
        logger.warn('Embedding cache snapshot is from another model, ignoring', {
          snapshotModel: snapshot.model ?? null,
          model: this.deps.options.embeddingModel ?? null,
        });
        return;
      }
      this.caches.candidate.restore(snapshot.candidate);
      this.caches.reference.restore(snapshot.reference);
      logger.info('Embedding caches restored', {
        candidate: this.caches.candidate.size,
        reference: this.caches.reference.size,
      });
    } catch (error) {
      logger.warn('Embedding cache snapshot not restored', { error: errorMessage(error) });
    }
  }

  async saveCacheSnapshot(): Promise<void> {
    await this.repository.saveCacheSnapshot({
      model: this.deps.options.embeddingModel,
      candidate: this.caches.candidate.snapshot(),
      reference: this.caches.reference.snapshot(),
    });
  }

  /**
   * Run one cycle. Returns a skipped report when a cycle is already in flight.
   */
  async runCycle(): Promise<CycleReport> {
    const startedAt = this.now();
    const report: CycleReport = {
      cycleId: nanoid(10),
      status: 'ok',
      startedAt: startedAt.toISOString(),
      portalFound: 0,
      portalNew: 0,
      aggregatorFound: 0,
      aggregatorNew: 0,
      aggregatorSkipped: 0,
      renamed: 0,
      sent: 0,
      durationMs: 0,
    };

    if (this.running) {
      logger.warn('Cycle already in progress, skipping');
      return { ...report, status: 'skipped' };
    }

    this.running = true;
    const clockStart = performance.now();
    const log = logger.child({ cycleId: report.cycleId });
    log.info('Cycle started');

    try {
      await this.execute(startedAt, report, log);
    } catch (error) {
      report.status = 'error';
      report.error = errorMessage(error);
      log.error('Cycle failed', { error: report.error });
    } finally {
      this.running = false;
      report.durationMs = Math.round(performance.now() - clockStart);
      this.lastReport = report;
    }

    log.info('Cycle finished', { ...report });
    return report;
  }

  private async execute(now: Date, report: CycleReport, log: Logger): Promise<void> {
    const { repository, options } = this.deps;

    const [portalHistory, aggregatorHistory, analyzed] = await Promise.all([
      repository.loadPortalHistory(),
      repository.loadAggregatorHistory(),
      repository.loadAnalyzedUrls(),
    ]);

    this.maintenance.pruneIfDue(now, portalHistory, aggregatorHistory);

    // Portal first: its new items join the reference pool for this cycle
    const portal = await this.deps.portalSource.safeFetch();
    report.portalFound = portal.items.length;

    const pool = buildReferencePool(
      [...portalHistory, ...newPortalItems(portal.items, portalHistory, now)],
      options.maxNewsAgeDays,
      now
    );

    const aggregator = await collectAggregatorMatches(this.deps.aggregatorSource, this.deps.matcher, {
      pool,
      history: aggregatorHistory,
      analyzed,
      now,
    });
    report.aggregatorFound = aggregator.fetch.items.length;
    report.aggregatorSkipped = aggregator.stats.alreadyAnalyzed;

    const merged = reconcileHistory({
      fetchedPortal: portal.items,
      portalHistory,
      aggregatorMatches: aggregator.accepted,
      aggregatorHistory,
      renames: aggregator.renames,
      now,
    });
    report.portalNew = merged.newPortalItems.length;
    report.aggregatorNew = merged.newAggregatorItems.length;
    report.renamed = merged.appliedRenames.length;

    // Any failure here propagates: nothing is delivered this cycle
    if (merged.portalChanged) {
      await repository.savePortalHistory(merged.portalHistory);
    }
    if (merged.aggregatorChanged) {
      try {
        await repository.saveAggregatorHistory(merged.aggregatorHistory);
      } catch (error) {
        if (merged.portalChanged) {
          await this.rollBackPortalHistory(portalHistory, log);
        }
        throw error;
      }
    }

    if (analyzed.add(aggregator.analyzedUrls) > 0) {
      try {
        await repository.saveAnalyzedUrls(analyzed);
      } catch (error) {
        log.error('Analyzed URLs not saved', { error: errorMessage(error) });
      }
    }

    if (options.snapshotCache) {
      try {
        await this.saveCacheSnapshot();
      } catch (error) {
        log.warn('Embedding cache snapshot not saved', { error: errorMessage(error) });
      }
    }

    const labels = options.labels ?? DEFAULT_LABELS;
    const deliverables = [
      ...merged.newPortalItems.map((item) => portalDeliverable(item, labels)),
      ...merged.newAggregatorItems.map((record) => aggregatorDeliverable(record, labels)),
    ];
    if (deliverables.length > 0) {
      report.sent = await this.deps.sink.send(deliverables);
    }
  }

  /**
   * Put back the portal history this cycle started from. New portal items
   * stay unknown and are found again next cycle.
   */
  private async rollBackPortalHistory(previous: readonly ReferenceItem[], log: Logger): Promise<void> {
    try {
      await this.deps.repository.savePortalHistory(previous);
      log.warn('Portal history rolled back after aggregator save failed', { items: previous.length });
    } catch (error) {
      log.error('Portal history rollback failed', { error: errorMessage(error) });
    }
  }
}
