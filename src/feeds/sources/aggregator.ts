/**
 * NewsRelay — Aggregator Source
 *
 * Scrapes the aggregator's topic page: `div[data-testid="news-item"]` cards,
 * headline in the card's avatar-text paragraph, falling back to the link text.
 */

import type { CandidateItem } from '../../types/news';
import { NewsSource, type SourceOptions } from '../base';
import { attribute, elements, firstText, textContent } from '../html';
import { normalizeAggregatorUrl } from '../url';

export function parseAggregatorPage(html: string, origin: string, maxItems = 20): CandidateItem[] {
  const cards = elements(html, 'div', (open) => attribute(open, 'data-testid') === 'news-item');
  const items: CandidateItem[] = [];
  const seen = new Set<string>();

  for (const card of cards.slice(0, maxItems)) {
    const [link] = elements(card.inner, 'a', (open) => attribute(open, 'href') !== undefined);
    const href = link ? attribute(link.openTag, 'href') : undefined;
    if (!link || !href) continue;

    const title =
      firstText(card.inner, 'p', (c) => c.includes('card-top-avatar__text')) || textContent(link.inner);
    const url = normalizeAggregatorUrl(href, origin);
    if (!url || !title || seen.has(url)) continue;
    seen.add(url);
    items.push({ url, title });
  }

  return items;
}

export interface AggregatorSourceOptions extends SourceOptions {
  url: string;
}

export class AggregatorSource extends NewsSource<CandidateItem> {
  readonly name = 'aggregator';
  private readonly url: string;

  constructor(options: AggregatorSourceOptions) {
    super(options);
    this.url = options.url;
  }

  async fetch(): Promise<CandidateItem[]> {
    const html = await this.fetchPage(this.url);
    const items = parseAggregatorPage(html, new URL(this.url).origin, this.maxItems);
    this.logger.debug('Aggregator cards parsed', { count: items.length });
    return items;
  }
}
