/**
 * NewsRelay — Cache Cleanup
 *
 * Prunes the persisted embedding cache snapshot: entries older than the
 * max age are removed unless history still refers to their URL.
 *
 * Usage:
 *   npm run clear-cache                 # Show stats, ask before pruning
 *   npm run clear-cache -- --force      # No confirmation
 *   npm run clear-cache -- --age 7      # Override max age (days)
 */

import 'dotenv/config';
import inquirer from 'inquirer';
import { loadConfig } from '../src/lib/config';
import { errorMessage, logger } from '../src/lib/logger';
import { EmbeddingCache } from '../src/matching/embedding-cache';
import type { ReferenceEmbeddings } from '../src/matching/scorer';
import { collectKeepUrls, describeCaches, pruneCaches } from '../src/pipeline/maintenance';
import { createRepository } from '../src/pipeline';
import type { Vector } from '../src/providers/embeddings';

interface CleanupOptions {
  force: boolean;
  ageDays?: number;
}

function parseArgs(): CleanupOptions {
  const args = process.argv.slice(2);
  const ageIndex = args.indexOf('--age');
  let ageDays: number | undefined;

  if (ageIndex !== -1) {
    const parsed = Number(args[ageIndex + 1]);
    if (Number.isFinite(parsed) && parsed >= 0) {
      ageDays = parsed;
    } else {
      logger.warn('Invalid --age value, using configured default', { value: args[ageIndex + 1] });
    }
  }

  return { force: args.includes('--force'), ageDays };
}

async function confirm(message: string): Promise<boolean> {
  const { result } = await inquirer.prompt<{ result: boolean }>([
    {
      type: 'confirm',
      name: 'result',
      message,
      default: false,
    },
  ]);
  return result;
}

function formatAge(ms: number | null): string {
  if (ms === null) return '-';
  return `${(ms / 86_400_000).toFixed(1)}d`;
}

async function clearCache(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();
  const maxAgeDays = options.ageDays ?? config.cache.maxAgeDays;
  const repository = createRepository(config);

  const snapshot = await repository.loadCacheSnapshot();
  if (!snapshot) {
    console.log('No embedding cache snapshot found. Nothing to do.');
    return;
  }

  const caches = {
    candidate: new EmbeddingCache<Vector>({ capacity: config.cache.maxSize }),
    reference: new EmbeddingCache<ReferenceEmbeddings>({ capacity: config.cache.maxSize }),
  };
  caches.candidate.restore(snapshot.candidate);
  caches.reference.restore(snapshot.reference);

  const before = describeCaches(caches, maxAgeDays);
  console.log('\nEmbedding cache');
  for (const [name, d] of Object.entries(before)) {
    console.log(
      `  ${name.padEnd(9)} ${d.size}/${d.capacity} entries, ${d.olderThanMaxAge} older than ${maxAgeDays}d ` +
        `(oldest ${formatAge(d.oldestAgeMs)}, newest ${formatAge(d.newestAgeMs)})`
    );
  }

  if (!options.force && !(await confirm('Prune the embedding cache?'))) {
    console.log('Cancelled.');
    return;
  }

  const [portalHistory, aggregatorHistory] = await Promise.all([
    repository.loadPortalHistory(),
    repository.loadAggregatorHistory(),
  ]);
  const keepUrls = collectKeepUrls(portalHistory, aggregatorHistory);
  const report = pruneCaches(caches, keepUrls, maxAgeDays);

  await repository.saveCacheSnapshot({
    model: snapshot.model,
    candidate: caches.candidate.snapshot(),
    reference: caches.reference.snapshot(),
  });

  console.log(`\nKept URLs from history: ${report.keptUrls}`);
  console.log(
    `  candidate: ${report.candidate.before} → ${report.candidate.after} (removed ${report.candidate.removed})`
  );
  console.log(
    `  reference: ${report.reference.before} → ${report.reference.after} (removed ${report.reference.removed})`
  );
  console.log(`Memory: ${(process.memoryUsage().rss / 1024 / 1024).toFixed(1)} MB\n`);
}

clearCache().catch((error: unknown) => {
  const errorMsg = errorMessage(error);
  logger.error('Cache cleanup failed', { error: errorMsg });
  console.error('\nCache cleanup failed:', errorMsg);
  process.exit(1);
});
