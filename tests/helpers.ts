/**
 * NewsRelay — Test Helpers
 *
 * In-process stand-ins for the store, the sources, the scorer and the sink.
 */

import type { DeliverableItem } from '../src/delivery/messages';
import type { DeliverySink } from '../src/delivery/telegram';
import { NewsSource } from '../src/feeds/base';
import type { Scorer, ScoringReference } from '../src/matching/scorer';
import type { BlobStore } from '../src/storage/blob-store';
import type { CandidateItem, MatchRecord, ReferenceItem } from '../src/types/news';

export class MemoryBlobStore implements BlobStore {
  readonly docs = new Map<string, string>();
  failWritesFor = new Set<string>();

  async read(key: string): Promise<string | null> {
    return this.docs.get(key) ?? null;
  }

  async write(key: string, contents: string): Promise<void> {
    if (this.failWritesFor.has(key)) {
      throw new Error('disk full');
    }
    this.docs.set(key, contents);
  }

  json(key: string): unknown {
    const raw = this.docs.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }
}

export class StaticSource<T> extends NewsSource<T> {
  readonly name: string;
  items: T[] | Error;
  gate: Promise<void> = Promise.resolve();

  constructor(name: string, items: T[] | Error) {
    super();
    this.name = name;
    this.items = items;
  }

  async fetch(): Promise<T[]> {
    await this.gate;
    if (this.items instanceof Error) throw this.items;
    return this.items;
  }
}

/**
 * Scores looked up by `${candidate.url}|${reference.url}`; anything else is 0.
 */
export class TableScorer implements Scorer {
  readonly calls: string[] = [];

  constructor(private readonly scores: Record<string, number>) {}

  async score(candidate: CandidateItem, reference: ScoringReference): Promise<number> {
    const key = `${candidate.url}|${reference.url}`;
    this.calls.push(key);
    return this.scores[key] ?? 0;
  }
}

export class RecordingSink implements DeliverySink {
  readonly messages: { url: string; text: string }[] = [];

  async send(items: readonly DeliverableItem[]): Promise<number> {
    for (const item of items) {
      this.messages.push({ url: item.url, text: item.renderMessage() });
    }
    return items.length;
  }
}

export function makeReference(overrides: Partial<ReferenceItem> & { url: string }): ReferenceItem {
  return {
    title: 'Новость портала',
    addedAt: '2024-03-10T08:00:00.000Z',
    inTargetFeed: false,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<MatchRecord> & { url: string }): MatchRecord {
  return {
    title: 'Новость агрегатора',
    addedAt: '2024-03-09T08:00:00.000Z',
    matchType: 'keyword',
    matchedKeywords: [],
    ...overrides,
  };
}
