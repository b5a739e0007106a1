/**
 * NewsRelay — Analyzed URL Set
 *
 * Aggregator URLs already evaluated by some cycle, matched or not.
 * Bounded; when full the oldest insertions go first.
 */

export const DEFAULT_MAX_ANALYZED_URLS = 5000;

export class AnalyzedUrlSet {
  private readonly urls = new Set<string>();

  constructor(
    initial: Iterable<string> = [],
    readonly capacity: number = DEFAULT_MAX_ANALYZED_URLS
  ) {
    this.add(initial);
  }

  get size(): number {
    return this.urls.size;
  }

  has(url: string): boolean {
    return this.urls.has(url);
  }

  /**
   * Add URLs, keeping the position of ones already present.
   * Returns how many were new.
   */
  add(urls: Iterable<string>): number {
    let added = 0;
    for (const url of urls) {
      if (!url || this.urls.has(url)) continue;
      this.urls.add(url);
      added++;
    }
    this.trim();
    return added;
  }

  private trim(): void {
    for (const url of this.urls) {
      if (this.urls.size <= this.capacity) break;
      this.urls.delete(url);
    }
  }

  toArray(): string[] {
    return Array.from(this.urls);
  }
}
