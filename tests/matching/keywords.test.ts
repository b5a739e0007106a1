/**
 * Tests for topic keyword matching
 */

import { mkdtempSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { KeywordMatcher } from '../../src/matching/keywords';

describe('KeywordMatcher', () => {
  const matcher = new KeywordMatcher(['Скорая помощь', 'врач', 'врач', '']);

  it('should normalize and deduplicate phrases', () => {
    expect(matcher.phrases).toEqual(['скорая помощь', 'врач']);
  });

  describe('matchesIn', () => {
    it('should match phrases as substrings', () => {
      expect(matcher.matchesIn('Врачи спасли пациента')).toEqual(['врач']);
    });

    it('should match inflected multi-word phrases', () => {
      expect(matcher.matchesIn('Бригада скорой помощи приехала за 5 минут')).toEqual(['скорая помощь']);
    });

    it('should return nothing for unrelated titles', () => {
      expect(matcher.matchesIn('Погода на выходные')).toEqual([]);
      expect(matcher.matchesIn('')).toEqual([]);
    });
  });

  describe('sharedPhrase', () => {
    it('should find a single word present as a whole token in both titles', () => {
      expect(matcher.sharedPhrase('Врач принял пациента', 'Новый врач в поликлинике')).toBe('врач');
    });

    it('should not match a single word inside a longer token', () => {
      expect(matcher.sharedPhrase('Врачи приняли пациентов', 'Новый врач в поликлинике')).toBeNull();
    });

    it('should find multi-word phrases as substrings', () => {
      expect(
        matcher.sharedPhrase('Скорая помощь приехала', 'Работа службы «Скорая помощь»')
      ).toBe('скорая помощь');
    });
  });

  describe('fromFile', () => {
    it('should load the bundled topic list', () => {
      expect(KeywordMatcher.fromFile().phrases).toContain('поликлиника');
    });

    it('should ignore non-string entries', () => {
      const dir = mkdtempSync(path.join(os.tmpdir(), 'newsrelay-keywords-'));
      const file = path.join(dir, 'keywords.json');
      writeFileSync(file, JSON.stringify({ topics: ['Донор', 42, null] }));

      expect(KeywordMatcher.fromFile(file).phrases).toEqual(['донор']);
    });
  });
});
