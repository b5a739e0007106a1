/**
 * NewsRelay — URL Normalization
 */

/**
 * Portal article identity: query string dropped, exactly one trailing slash.
 */
export function normalizePortalUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) return trimmed;
  const withoutQuery = trimmed.split('?')[0] ?? trimmed;
  return `${withoutQuery.replace(/\/+$/, '')}/`;
}

/**
 * Aggregator item identity: absolute, query string dropped.
 */
export function normalizeAggregatorUrl(href: string, origin: string): string {
  const trimmed = href.trim();
  if (!trimmed) return trimmed;
  const absolute = /^https?:\/\//i.test(trimmed)
    ? trimmed
    : `${origin.replace(/\/+$/, '')}/${trimmed.replace(/^\/+/, '')}`;
  return absolute.split('?')[0] ?? absolute;
}
