/**
 * @module merge/merger.test
 * @description Unit tests for candidate merging and containment priority
 * @status COMPLETE
 * @dependencies src/merge/merger.ts
 * @lastModified 2026-10-16
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_PRIORITY, boundByReference, isValidSpan, mergeCandidates } from './merger';
import type { CanonicalType, EntityCandidate } from '../types/entities';
import { overlapLength } from '../types/common';

// ============================================================================
// Test Helpers
// ============================================================================

function createCandidate(
  canonicalType: CanonicalType,
  start: number,
  end: number,
  overrides: Partial<EntityCandidate> = {}
): EntityCandidate {
  return {
    start,
    end,
    canonicalType,
    rawType: canonicalType,
    score: 0.8,
    source: 'PATTERN',
    ...overrides,
  };
}

describe('merge/merger', () => {
  describe('isValidSpan', () => {
    it('should accept spans inside the text', () => {
      expect(isValidSpan(createCandidate('PERSON', 0, 5), 5)).toBe(true);
    });

    it('should reject empty, reversed, fractional and out-of-range spans', () => {
      expect(isValidSpan(createCandidate('PERSON', 3, 3), 10)).toBe(false);
      expect(isValidSpan(createCandidate('PERSON', 4, 2), 10)).toBe(false);
      expect(isValidSpan(createCandidate('PERSON', 0.5, 2), 10)).toBe(false);
      expect(isValidSpan(createCandidate('PERSON', -1, 2), 10)).toBe(false);
      expect(isValidSpan(createCandidate('PERSON', 0, 11), 10)).toBe(false);
    });
  });

  describe('mergeCandidates', () => {
    it('should keep disjoint candidates of different types', () => {
      // "Contact John Smith, john@x.com"
      const email = createCandidate('EMAIL', 20, 30);
      const person = createCandidate('PERSON', 8, 18, { source: 'NER' });

      const result = mergeCandidates([email, person], 30);

      expect(result.candidates).toEqual([person, email]);
      expect(result.dropped).toEqual([]);
    });

    it('should drop a contained candidate of lower priority', () => {
      const phone = createCandidate('PHONE', 5, 20);
      const person = createCandidate('PERSON', 8, 12, { source: 'NER' });

      const result = mergeCandidates([person, phone], 30);

      expect(result.candidates).toEqual([phone]);
      expect(result.dropped).toEqual([
        { candidate: person, reason: 'CONTAINED_BY_PRIORITY', detail: 'contained by PHONE[5,20)' },
      ]);
    });

    it('should keep a contained candidate of higher priority', () => {
      const location = createCandidate('LOCATION', 0, 30);
      const zip = createCandidate('ZIP_CODE', 1, 9);

      const result = mergeCandidates([location, zip], 30);

      expect(result.candidates).toEqual([location, zip]);
    });

    it('should keep partially overlapping candidates of different types', () => {
      const org = createCandidate('ORGANIZATION', 0, 10);
      const location = createCandidate('LOCATION', 6, 15);
      expect(mergeCandidates([org, location], 20).candidates).toHaveLength(2);
    });

    it('should merge overlapping same-type candidates into their union', () => {
      const result = mergeCandidates(
        [
          createCandidate('PERSON', 0, 6, { score: 0.6, rawType: 'PER', source: 'NER' }),
          createCandidate('PERSON', 4, 10, { score: 0.9, rawType: '人名', source: 'TRANSFORMER' }),
        ],
        20
      );

      expect(result.candidates).toEqual([
        createCandidate('PERSON', 0, 10, { score: 0.9, rawType: '人名', source: 'TRANSFORMER' }),
      ]);
    });

    it('should merge adjacent same-type candidates', () => {
      const result = mergeCandidates(
        [createCandidate('LOCATION', 0, 3), createCandidate('LOCATION', 3, 6, { score: 0.5 })],
        10
      );
      expect(result.candidates.map((c) => [c.start, c.end, c.score])).toEqual([[0, 6, 0.8]]);
    });

    it('should drop invalid spans', () => {
      const bad = createCandidate('EMAIL', 8, 12);
      const result = mergeCandidates([bad, createCandidate('EMAIL', 0, 4)], 10);

      expect(result.candidates.map((c) => c.start)).toEqual([0]);
      expect(result.dropped).toEqual([
        { candidate: bad, reason: 'INVALID_SPAN', detail: '[8,12) outside text of length 10' },
      ]);
    });

    it('should rank unlisted types below every listed type', () => {
      const person = createCandidate('PERSON', 0, 10);
      const gender = createCandidate('GENDER', 2, 4);

      const result = mergeCandidates([person, gender], 10, { priority: ['PERSON'] });

      expect(result.candidates).toEqual([person]);
    });

    it('should leave no overlapping same-type candidates', () => {
      const input = [
        createCandidate('PERSON', 0, 4, { score: 0.4 }),
        createCandidate('PERSON', 2, 7, { score: 0.7 }),
        createCandidate('PERSON', 6, 9, { score: 0.5 }),
        createCandidate('PERSON', 12, 15),
        createCandidate('LOCATION', 3, 8),
        createCandidate('LOCATION', 7, 20, { score: 0.9 }),
      ];

      const { candidates } = mergeCandidates(input, 20);

      for (const a of candidates) {
        for (const b of candidates) {
          if (a !== b && a.canonicalType === b.canonicalType) {
            expect(overlapLength(a, b)).toBe(0);
          }
        }
      }
    });

    it('should be idempotent', () => {
      const input = [
        createCandidate('PERSON', 0, 4, { score: 0.5 }),
        createCandidate('LOCATION', 0, 3, { score: 0.6 }),
        createCandidate('PERSON', 2, 6, { score: 0.9 }),
        createCandidate('PHONE', 10, 22),
        createCandidate('PERSON', 12, 14),
      ];

      const once = mergeCandidates(input, 30, { priority: DEFAULT_PRIORITY });
      const twice = mergeCandidates(once.candidates, 30, { priority: DEFAULT_PRIORITY });

      expect(twice.candidates).toEqual(once.candidates);
      expect(twice.dropped).toEqual([]);
    });

    it('should not depend on input order', () => {
      const input = [
        createCandidate('EMAIL', 5, 15),
        createCandidate('PERSON', 0, 4),
        createCandidate('EMAIL', 10, 18, { score: 0.95 }),
      ];

      const forward = mergeCandidates(input, 20);
      const backward = mergeCandidates([...input].reverse(), 20);

      expect(backward.candidates).toEqual(forward.candidates);
    });
  });

  describe('boundByReference', () => {
    it('should keep the strongest candidate inside each reference candidate', () => {
      const weak = createCandidate('PHONE', 0, 5, { score: 0.6 });
      const strong = createCandidate('PHONE', 5, 10, { score: 0.9 });
      const person = createCandidate('PERSON', 3, 8, { source: 'NER' });

      const result = boundByReference([weak, strong, person], [createCandidate('PHONE', 0, 10)]);

      expect(result.candidates).toEqual([strong]);
      expect(result.dropped).toEqual([
        { candidate: weak, reason: 'OUTSIDE_NON_STRICT', detail: 'shares PHONE[0,10) with a stronger candidate' },
        { candidate: person, reason: 'OUTSIDE_NON_STRICT', detail: 'no same-type non-strict candidate covers it' },
      ]);
    });

    it('should prefer the longer candidate on equal scores', () => {
      const short = createCandidate('PERSON', 0, 2);
      const long = createCandidate('PERSON', 0, 4);

      expect(boundByReference([short, long], [createCandidate('PERSON', 0, 4)]).candidates).toEqual([long]);
    });
  });
});
