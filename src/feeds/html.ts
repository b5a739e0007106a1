/**
 * NewsRelay — HTML helpers
 *
 * Just enough markup handling for card extraction from listing pages.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  laquo: '«',
  raquo: '»',
  mdash: '—',
  ndash: '–',
  hellip: '…',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? whole;
  });
}

/**
 * Visible text of a fragment: tags removed, entities decoded, whitespace collapsed.
 */
export function textContent(fragment: string): string {
  return decodeEntities(fragment.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

export function attribute(tag: string, name: string): string | undefined {
  const match = new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i').exec(tag);
  if (!match) return undefined;
  return decodeEntities(match[1] ?? match[2] ?? '');
}

export interface Element {
  openTag: string;
  inner: string;
}

/**
 * Inner HTML of every `<tag ...>` whose opening tag satisfies `test`.
 * Elements of the same tag nested inside a match are balanced.
 */
export function elements(html: string, tag: string, test: (openTag: string) => boolean): Element[] {
  const results: Element[] = [];
  const tagPattern = new RegExp(`<(/?)${tag}\\b[^>]*>`, 'gi');
  let match: RegExpExecArray | null;

  while ((match = tagPattern.exec(html)) !== null) {
    if (match[1] === '/') continue;
    const openTag = match[0];
    if (!test(openTag)) continue;

    const start = tagPattern.lastIndex;
    const closing = new RegExp(`<(/?)${tag}\\b[^>]*>`, 'gi');
    closing.lastIndex = start;
    let depth = 1;
    let end = html.length;
    let m: RegExpExecArray | null;
    while ((m = closing.exec(html)) !== null) {
      depth += m[1] === '/' ? -1 : 1;
      if (depth === 0) {
        end = m.index;
        break;
      }
    }
    results.push({ openTag, inner: html.slice(start, end) });
  }

  return results;
}

export function elementsByClass(
  html: string,
  tag: string,
  classTest: (className: string) => boolean
): Element[] {
  return elements(html, tag, (openTag) => classTest(attribute(openTag, 'class') ?? ''));
}

/**
 * First `<tag>` in a fragment whose class satisfies `classTest`, as text.
 */
export function firstText(
  fragment: string,
  tag: string,
  classTest: (className: string) => boolean
): string {
  const [element] = elementsByClass(fragment, tag, classTest);
  return element ? textContent(element.inner) : '';
}
