/**
 * NewsRelay — Municipal Portal Source
 *
 * Scrapes news listing pages of the city portal. Two listing layouts exist:
 * - department news pages: `li.mos-oiv-news-page-list__item` cards
 * - the cross-portal news feed: `li` cards with a `Heading-Text` heading
 *
 * Items are deduplicated by normalized URL across all configured pages.
 */

import type { PortalArticle } from '../../types/news';
import { NewsSource, type SourceOptions } from '../base';
import { attribute, elements, elementsByClass, firstText, textContent } from '../html';
import { normalizePortalUrl } from '../url';

export const PORTAL_ORIGIN = 'https://www.mos.ru';

const DEPARTMENT_CARD = 'mos-oiv-news-page-list__item';
const DEPARTMENT_LINK = 'mos-oiv-news-page__link';
const DEPARTMENT_TEXT = 'mos-oiv-news-page__text';

function absolutize(href: string, origin: string): string {
  if (/^https?:\/\//i.test(href)) return href;
  return `${origin}${href.startsWith('/') ? '' : '/'}${href}`;
}

function parseDepartmentCard(inner: string): { href?: string; title: string; snippet: string } {
  const [link] = elementsByClass(inner, 'a', (c) => c.includes(DEPARTMENT_LINK));
  return {
    href: link ? attribute(link.openTag, 'href') : undefined,
    title: link ? textContent(link.inner) : '',
    snippet: firstText(inner, 'p', (c) => c.includes(DEPARTMENT_TEXT)),
  };
}

function parseFeedCard(inner: string): { href?: string; title: string; snippet: string } {
  const [link] = elements(
    inner,
    'a',
    (open) => attribute(open, 'href') !== undefined && attribute(open, 'target') !== undefined
  );
  return {
    href: link ? attribute(link.openTag, 'href') : undefined,
    title: firstText(inner, 'h5', (c) => c.includes('Heading-Text')),
    snippet: firstText(inner, 'p', (c) => c.includes('Paragraph-Text')),
  };
}

/**
 * Extract article cards from one listing page, in page order.
 */
export function parsePortalPage(
  html: string,
  origin: string = PORTAL_ORIGIN,
  maxItems = 20
): PortalArticle[] {
  const items: PortalArticle[] = [];
  const seen = new Set<string>();

  for (const card of elements(html, 'li', () => true)) {
    const className = attribute(card.openTag, 'class') ?? '';
    const parsed = className.includes(DEPARTMENT_CARD)
      ? parseDepartmentCard(card.inner)
      : parseFeedCard(card.inner);

    if (!parsed.href || !parsed.title) continue;
    const url = normalizePortalUrl(absolutize(parsed.href, origin));
    if (seen.has(url)) continue;
    seen.add(url);

    items.push({ url, title: parsed.title, snippet: parsed.snippet || undefined });
    if (items.length >= maxItems) break;
  }

  return items;
}

export interface PortalSourceOptions extends SourceOptions {
  urls: string[];
  origin?: string;
}

export class PortalSource extends NewsSource<PortalArticle> {
  readonly name = 'portal';
  private readonly urls: string[];
  private readonly origin: string;

  constructor(options: PortalSourceOptions) {
    super(options);
    this.urls = options.urls;
    this.origin = options.origin ?? PORTAL_ORIGIN;
  }

  async fetch(): Promise<PortalArticle[]> {
    const byUrl = new Map<string, PortalArticle>();
    let failures = 0;
    let lastError: unknown;

    for (const pageUrl of this.urls) {
      try {
        const html = await this.fetchPage(pageUrl);
        const items = parsePortalPage(html, this.origin, this.maxItems);
        if (items.length === 0) {
          this.logger.warn('No news cards found on page', { pageUrl });
        }
        for (const item of items) {
          if (!byUrl.has(item.url)) byUrl.set(item.url, item);
        }
      } catch (error) {
        failures++;
        lastError = error;
        this.logger.warn('Portal page failed', {
          pageUrl,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (this.urls.length > 0 && failures === this.urls.length) {
      throw lastError instanceof Error ? lastError : new Error(String(lastError));
    }

    return Array.from(byUrl.values());
  }
}
