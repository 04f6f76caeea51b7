/**
 * @module masking/masker.test
 * @description Unit tests for masking modes and overlap handling
 * @status COMPLETE
 * @dependencies src/masking/masker.ts
 * @lastModified 2026-10-18
 */

import { describe, it, expect } from 'vitest';
import { createMasker, maskText } from './masker';
import type { CanonicalType, EntityCandidate } from '../types/entities';

function createCandidate(
  start: number,
  end: number,
  canonicalType: CanonicalType,
  overrides: Partial<EntityCandidate> = {}
): EntityCandidate {
  return { start, end, canonicalType, rawType: canonicalType, score: 0.9, source: 'NER', ...overrides };
}

const TEXT = 'Sato met Tanaka. Sato called 03-1234-5678.';
const CANDIDATES = [
  createCandidate(29, 41, 'PHONE', { source: 'PATTERN' }),
  createCandidate(0, 4, 'PERSON'),
  createCandidate(9, 15, 'PERSON'),
  createCandidate(17, 21, 'PERSON'),
];

describe('masking/masker', () => {
  describe('modes', () => {
    it('should use type tags by default', () => {
      expect(maskText(TEXT, CANDIDATES).masked).toBe('[PERSON] met [PERSON]. [PERSON] called [PHONE].');
    });

    it('should number values by first appearance', () => {
      expect(maskText(TEXT, CANDIDATES, { mode: 'numbered' }).masked).toBe(
        '[PERSON_1] met [PERSON_2]. [PERSON_1] called [PHONE_1].'
      );
    });

    it('should apply fixed per-type masks', () => {
      expect(maskText(TEXT, CANDIDATES, { mode: 'fixed' }).masked).toBe('**** met ****. **** called ***-****-****.');
    });

    it('should let callers override fixed masks', () => {
      const result = maskText(TEXT, CANDIDATES, { mode: 'fixed', fixedMasks: { PERSON: '○○' }, defaultMask: '#' });
      expect(result.masked).toBe('○○ met ○○. ○○ called ***-****-****.');
    });
  });

  describe('result', () => {
    it('should list redactions in text order', () => {
      const result = maskText(TEXT, CANDIDATES);

      expect(result.count).toBe(4);
      expect(result.wasMasked).toBe(true);
      expect(result.redactions.map((r) => r.position.start)).toEqual([0, 9, 17, 29]);
      expect(result.redactions[3]).toEqual({
        type: 'PHONE',
        source: 'PATTERN',
        placeholder: '[PHONE]',
        position: { start: 29, end: 41 },
      });
      expect(result.original).toBeUndefined();
    });

    it('should keep originals only when asked', () => {
      const result = maskText(TEXT, CANDIDATES, { trackOriginals: true });

      expect(result.original).toBe(TEXT);
      expect(result.redactions.map((r) => r.originalValue)).toEqual(['Sato', 'Tanaka', 'Sato', '03-1234-5678']);
    });

    it('should leave text without candidates untouched', () => {
      expect(maskText(TEXT, [])).toEqual({ masked: TEXT, redactions: [], count: 0, wasMasked: false, skipped: [] });
    });
  });

  describe('overlaps', () => {
    it('should mask the uncovered tail of a partly overlapping span', () => {
      const location = createCandidate(0, 8, 'LOCATION');
      const person = createCandidate(6, 10, 'PERSON');
      const result = maskText('東京都渋谷区山田太郎です', [person, location], { trackOriginals: true });

      expect(result.masked).toBe('[LOCATION][PERSON]です');
      expect(result.redactions.map((r) => [r.position, r.originalValue])).toEqual([
        [{ start: 0, end: 8 }, '東京都渋谷区山田'],
        [{ start: 8, end: 10 }, '太郎'],
      ]);
      expect(result.skipped).toEqual([]);
    });

    it('should skip spans inside an earlier one', () => {
      const org = createCandidate(0, 16, 'ORGANIZATION');
      const person = createCandidate(10, 16, 'PERSON');
      const result = maskText('Acme Corp Tanaka Ltd', [person, org]);

      expect(result.masked).toBe('[ORGANIZATION] Ltd');
      expect(result.skipped).toEqual([person]);
    });

    it('should ignore spans outside the text', () => {
      const result = maskText('short', [createCandidate(2, 40, 'PERSON')]);
      expect(result.masked).toBe('short');
      expect(result.count).toBe(0);
    });
  });

  it('should build reusable maskers', () => {
    const mask = createMasker({ mode: 'numbered' });
    expect(mask('Sato', [createCandidate(0, 4, 'PERSON')]).masked).toBe('[PERSON_1]');
    expect(mask('Sato', [createCandidate(0, 4, 'PERSON')]).masked).toBe('[PERSON_1]');
  });
});
