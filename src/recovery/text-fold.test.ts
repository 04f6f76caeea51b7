/**
 * @module recovery/text-fold.test
 * @description Unit tests for folded text views and similarity
 * @status COMPLETE
 * @dependencies src/recovery/text-fold.ts
 * @lastModified 2026-10-16
 */

import { describe, it, expect } from 'vitest';
import {
  buildFoldedView,
  editDistance,
  findInView,
  foldChar,
  foldString,
  isSkippable,
  similarity,
  trimToContent,
  trimWhitespace,
} from './text-fold';

describe('recovery/text-fold', () => {
  describe('foldChar', () => {
    it('should fold full-width forms and case', () => {
      expect(foldChar('Ａ')).toBe('a');
      expect(foldChar('１')).toBe('1');
      expect(foldChar('Q')).toBe('q');
    });

    it('should keep characters whose compatibility form is longer', () => {
      expect(foldChar('ﬁ')).toBe('ﬁ');
    });
  });

  describe('isSkippable', () => {
    it('should treat whitespace, punctuation and symbols as skippable', () => {
      for (const char of [' ', '\n', '　', '-', '：', '、', '@', '~', '〒']) {
        expect(isSkippable(char)).toBe(true);
      }
    });

    it('should keep letters, digits and ideographs', () => {
      for (const char of ['a', '7', '山', 'カ', 'ん']) {
        expect(isSkippable(char)).toBe(false);
      }
    });
  });

  describe('buildFoldedView', () => {
    it('should map folded positions back to source offsets', () => {
      const view = buildFoldedView('Ｔｅｌ： ０３');
      expect(view.folded).toBe('tel03');
      expect(view.starts).toEqual([0, 1, 2, 5, 6]);
      expect(view.ends).toEqual([1, 2, 3, 6, 7]);
    });

    it('should fold only the requested region', () => {
      const view = buildFoldedView('ab cd ef', 3, 5);
      expect(view.folded).toBe('cd');
      expect(view.starts).toEqual([3, 4]);
    });

    it('should keep surrogate pairs together', () => {
      const view = buildFoldedView('a𠮷b');
      expect(view.folded).toBe('a𠮷b');
      expect(view.starts).toEqual([0, 1, 1, 3]);
      expect(view.ends).toEqual([1, 3, 3, 4]);
    });
  });

  describe('findInView', () => {
    it('should return the source span of a folded hit', () => {
      const text = 'TEL：０３－１２３４－５６７８';
      expect(findInView(buildFoldedView(text), foldString('03-1234-5678'))).toEqual({ start: 4, end: 16 });
    });

    it('should return null for empty needles and misses', () => {
      const view = buildFoldedView('abc');
      expect(findInView(view, '')).toBeNull();
      expect(findInView(view, 'x')).toBeNull();
    });
  });

  describe('trimming', () => {
    it('should trim to content characters', () => {
      expect(trimToContent('  (abc)  ', 0, 9)).toEqual({ start: 3, end: 6 });
      expect(trimToContent(' -- ', 0, 4)).toBeNull();
    });

    it('should trim whitespace only', () => {
      expect(trimWhitespace(' (abc) ', 0, 7)).toEqual({ start: 1, end: 6 });
      expect(trimWhitespace('   ', 0, 3)).toBeNull();
    });
  });

  describe('similarity', () => {
    it('should compute edit distance', () => {
      expect(editDistance('kitten', 'sitting')).toBe(3);
      expect(editDistance('', 'abc')).toBe(3);
      expect(editDistance('same', 'same')).toBe(0);
    });

    it('should normalize by the longer string', () => {
      expect(similarity('kitten', 'sitting')).toBeCloseTo(4 / 7, 10);
      expect(similarity('', '')).toBe(1);
      expect(similarity('abcd', 'wxyz')).toBe(0);
    });
  });
});
