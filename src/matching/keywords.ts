/**
 * NewsRelay — Topic Keywords
 *
 * Configured topic phrases, used two ways:
 * - fallback classification: a phrase occurring anywhere in a title
 * - scorer bonus: the same phrase present in both titles being compared
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { normalizeText } from './text';

const KeywordFileSchema = z.object({
  topics: z.array(z.unknown()),
});

export const DEFAULT_KEYWORDS_PATH = new URL('../../data/keywords.json', import.meta.url);

/** Kept on a fallback match record. */
export const MAX_RECORDED_KEYWORDS = 5;

const STEM_PREFIX = 4;

export class KeywordMatcher {
  readonly phrases: readonly string[];

  constructor(phrases: readonly string[]) {
    const unique = new Set<string>();
    for (const phrase of phrases) {
      const normalized = normalizeText(phrase);
      if (normalized) unique.add(normalized);
    }
    this.phrases = Array.from(unique);
  }

  /**
   * Load a `{ "topics": [...] }` file. Non-string entries are ignored.
   */
  static fromFile(path: string | URL = DEFAULT_KEYWORDS_PATH): KeywordMatcher {
    const data = KeywordFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
    const phrases = data.topics.filter((t): t is string => typeof t === 'string');
    return new KeywordMatcher(phrases);
  }

  /**
   * Phrases found in the title. A phrase matches as a substring of the
   * normalized title; multi-word phrases also match inflected forms, where
   * consecutive title words start with the first four letters of each
   * phrase word ("скорой помощи" for "скорая помощь").
   */
  matchesIn(title: string): string[] {
    const normalized = normalizeText(title);
    if (!normalized) return [];
    const words = normalized.split(' ');
    return this.phrases.filter(
      (phrase) => normalized.includes(phrase) || matchesInflected(words, phrase.split(' '))
    );
  }

  /**
   * First phrase present in both titles. Single words must match a whole
   * token; multi-word phrases match as substrings.
   */
  sharedPhrase(a: string, b: string): string | null {
    const left = normalizeText(a);
    const right = normalizeText(b);
    if (!left || !right) return null;

    const paddedLeft = ` ${left} `;
    const paddedRight = ` ${right} `;

    for (const phrase of this.phrases) {
      if (phrase.includes(' ')) {
        if (left.includes(phrase) && right.includes(phrase)) return phrase;
      } else {
        const token = ` ${phrase} `;
        if (paddedLeft.includes(token) && paddedRight.includes(token)) return phrase;
      }
    }
    return null;
  }
}

function matchesInflected(words: readonly string[], phraseWords: readonly string[]): boolean {
  if (phraseWords.length < 2) return false;
  const stems = phraseWords.map((w) => w.slice(0, STEM_PREFIX));
  for (let i = 0; i + stems.length <= words.length; i++) {
    if (stems.every((stem, j) => (words[i + j] ?? '').startsWith(stem))) return true;
  }
  return false;
}
