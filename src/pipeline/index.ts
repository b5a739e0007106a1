/**
 * NewsRelay — Wiring
 *
 * Builds a monitor and scheduler from configuration.
 */

import type { AppConfig } from '../lib/config';
import { TelegramSink } from '../delivery/telegram';
import { AggregatorSource, PortalSource } from '../feeds/sources';
import { EmbeddingCache } from '../matching/embedding-cache';
import { KeywordMatcher } from '../matching/keywords';
import { Matcher } from '../matching/matcher';
import { SimilarityScorer, type ReferenceEmbeddings } from '../matching/scorer';
import { OpenAIEmbeddingProvider, type Vector } from '../providers/embeddings';
import { FileBlobStore, SupabaseBlobStore, type BlobStore } from '../storage/blob-store';
import { StateRepository } from '../storage/repository';
import { createStateClient } from '../storage/supabase';
import { NewsMonitor } from './cycle';
import { Scheduler } from './scheduler';

export * from './cycle';
export * from './maintenance';
export * from './scheduler';

export interface Application {
  monitor: NewsMonitor;
  scheduler: Scheduler;
}

export function createBlobStore(config: AppConfig): BlobStore {
  if (config.state.backend === 'supabase') {
    const client = createStateClient(config.state.supabaseUrl, config.state.supabaseKey);
    return new SupabaseBlobStore(client, config.state.bucket);
  }
  return new FileBlobStore(config.state.dir);
}

export function createRepository(config: AppConfig): StateRepository {
  return new StateRepository(createBlobStore(config), {
    maxAnalyzedUrls: config.state.maxAnalyzedUrls,
  });
}

export function createApplication(config: AppConfig): Application {
  const caches = {
    candidate: new EmbeddingCache<Vector>({ capacity: config.cache.maxSize }),
    reference: new EmbeddingCache<ReferenceEmbeddings>({ capacity: config.cache.maxSize }),
  };

  const keywords = config.matching.keywordsFile
    ? KeywordMatcher.fromFile(config.matching.keywordsFile)
    : KeywordMatcher.fromFile();

  const scorer = new SimilarityScorer({
    provider: new OpenAIEmbeddingProvider(config.embeddings),
    keywords,
    candidateCache: caches.candidate,
    referenceCache: caches.reference,
    settings: config.matching.scorer,
  });

  const monitor = new NewsMonitor({
    portalSource: new PortalSource({ urls: config.sources.portalUrls }),
    aggregatorSource: new AggregatorSource({ url: config.sources.aggregatorUrl }),
    matcher: new Matcher({
      scorer,
      keywords,
      similarityThreshold: config.matching.similarityThreshold,
    }),
    repository: createRepository(config),
    sink: new TelegramSink(config.telegram),
    caches,
    options: {
      maxNewsAgeDays: config.matching.maxNewsAgeDays,
      cacheMaxAgeDays: config.cache.maxAgeDays,
      snapshotCache: config.cache.snapshot,
      embeddingModel: config.embeddings.model,
      labels: {
        portal: config.sources.portalLabel,
        aggregator: config.sources.aggregatorLabel,
      },
    },
  });

  const scheduler = new Scheduler(() => monitor.runCycle(), {
    timezone: config.scheduler.timezone,
  });

  return { monitor, scheduler };
}
