/**
 * NewsRelay — News Source Base
 *
 * Abstract base class for scraped news sources.
 * A failing source yields zero items for the cycle; it never fails the cycle.
 */

import { errorMessage, logger, type Logger } from '../lib/logger';

export interface SourceFetchResult<T> {
  source: string;
  success: boolean;
  items: T[];
  durationMs: number;
  error?: string;
}

export interface SourceOptions {
  /** Request timeout per page */
  timeoutMs?: number;
  /** Upper bound on items taken from one page */
  maxItems?: number;
  userAgent?: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export abstract class NewsSource<T> {
  abstract readonly name: string;

  protected readonly timeoutMs: number;
  protected readonly maxItems: number;
  protected readonly userAgent: string;

  constructor(options: SourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxItems = options.maxItems ?? 20;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  private scopedLogger?: Logger;

  protected get logger(): Logger {
    this.scopedLogger ??= logger.child({ source: this.name });
    return this.scopedLogger;
  }

  /**
   * Fetch items from the source. Implementations may throw.
   */
  abstract fetch(): Promise<T[]>;

  /**
   * Execute fetch with error handling and logging.
   */
  async safeFetch(): Promise<SourceFetchResult<T>> {
    const startTime = Date.now();
    this.logger.debug('Starting fetch');

    try {
      const items = await this.fetch();
      const durationMs = Date.now() - startTime;
      this.logger.info('Fetch completed', { itemsFound: items.length, durationMs });
      return { source: this.name, success: true, items, durationMs };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Fetch failed', { error: message });
      return {
        source: this.name,
        success: false,
        items: [],
        durationMs: Date.now() - startTime,
        error: message,
      };
    }
  }

  /**
   * GET a page as text, failing on non-2xx and on timeout.
   */
  protected async fetchPage(url: string): Promise<string> {
    const res = await fetch(url, {
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'ru-RU,ru;q=0.9',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} for ${url}`);
    }
    return res.text();
  }
}
