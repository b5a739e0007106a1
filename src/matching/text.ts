/**
 * NewsRelay — Text Normalizer
 *
 * Deterministic transforms shared by embedding input, rename detection,
 * keyword checks and lexical overlap.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

// ============================================================
// WORD LISTS
// ============================================================

const WordListsSchema = z.object({
  stopWords: z.array(z.string()),
  reportingVerbs: z.array(z.string()),
});

const wordLists = WordListsSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/stop-words.json', import.meta.url), 'utf-8'))
);

/** Prepositions, pronouns, numerals and topic-generic words dropped from overlap. */
export const STOP_WORDS: ReadonlySet<string> = new Set(wordLists.stopWords);

/** Attribution verbs ("сообщил", "заявила", ...) excluded from overlap entirely. */
export const REPORTING_VERBS: ReadonlySet<string> = new Set(wordLists.reportingVerbs);

const MIN_TOKEN_LENGTH = 3;
const STEM_LENGTH = 4;

// ============================================================
// NORMALIZATION
// ============================================================

/**
 * Lowercase, blank out everything but Cyrillic, Latin, digits and whitespace,
 * collapse runs of whitespace.
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .toLowerCase()
    .replace(/[^а-яёa-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Crude-stemmed token set for overlap counting.
 * Stop words are matched against the whole token, before truncation.
 */
export function tokensForOverlap(
  text: string | null | undefined,
  exclude: ReadonlySet<string> = new Set()
): Set<string> {
  const tokens = new Set<string>();
  const normalized = normalizeText(text);
  if (!normalized) return tokens;

  for (const word of normalized.split(' ')) {
    if (word.length < MIN_TOKEN_LENGTH) continue;
    if (STOP_WORDS.has(word) || exclude.has(word)) continue;
    tokens.add(word.slice(0, STEM_LENGTH));
  }
  return tokens;
}

/**
 * Number of shared stems between two titles, reporting verbs excluded.
 */
export function countCommonWords(a: string, b: string): number {
  const left = tokensForOverlap(a, REPORTING_VERBS);
  const right = tokensForOverlap(b, REPORTING_VERBS);
  let common = 0;
  for (const token of left) {
    if (right.has(token)) common++;
  }
  return common;
}
