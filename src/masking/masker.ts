/**
 * @module masking/masker
 * @description Render reconciled candidates into masked text
 * @status COMPLETE
 * @dependencies src/types/entities.ts
 * @lastModified 2026-10-18
 */

import type { CanonicalType, DetectorSource, EntityCandidate } from '../types/entities';
import type { Span } from '../types/common';
import { FIXED_MASKS } from '../constants';

// ============================================================================
// Types
// ============================================================================

/**
 * - `tag`: `[PERSON]`
 * - `numbered`: `[PERSON_1]`; the same value of the same type keeps its number
 * - `fixed`: a per-type mask such as `***-****-****`
 */
export type MaskMode = 'tag' | 'numbered' | 'fixed';

export const MASK_MODES = ['tag', 'numbered', 'fixed'] as const satisfies readonly MaskMode[];

export interface MaskOptions {
  mode?: MaskMode;
  /** Keep original values in the result (for auditing) */
  trackOriginals?: boolean;
  /** Per-type masks for `fixed` mode, merged over the built-in ones */
  fixedMasks?: Partial<Record<CanonicalType, string>>;
  /** Mask for types without their own in `fixed` mode */
  defaultMask?: string;
}

/**
 * Information about a single masked span
 */
export interface MaskInfo {
  type: CanonicalType;
  source: DetectorSource;
  /** Replacement written into the text */
  placeholder: string;
  /** Position in original text; trimmed where an earlier span covers the start */
  position: Span;
  /** Only when trackOriginals is set */
  originalValue?: string;
}

export interface MaskResult {
  masked: string;
  /** Original text (only if trackOriginals is true) */
  original?: string;
  /** Masked spans in text order */
  redactions: MaskInfo[];
  count: number;
  wasMasked: boolean;
  /** Candidates not masked because earlier spans already cover them entirely */
  skipped: EntityCandidate[];
}

const BUILTIN_FIXED_MASKS: Partial<Record<CanonicalType, string>> = {
  PHONE: FIXED_MASKS.PHONE,
  ZIP_CODE: FIXED_MASKS.ZIP_CODE,
};

// ============================================================================
// Placeholders
// ============================================================================

type PlaceholderFn = (candidate: EntityCandidate, value: string) => string;

function createPlaceholderFn(options: MaskOptions): PlaceholderFn {
  switch (options.mode ?? 'tag') {
    case 'tag':
      return (candidate) => `[${candidate.canonicalType}]`;

    case 'numbered': {
      const numbers = new Map<string, number>();
      const countByType = new Map<CanonicalType, number>();
      return (candidate, value) => {
        const key = `${candidate.canonicalType}\u0000${value}`;
        let number = numbers.get(key);
        if (number === undefined) {
          number = (countByType.get(candidate.canonicalType) ?? 0) + 1;
          countByType.set(candidate.canonicalType, number);
          numbers.set(key, number);
        }
        return `[${candidate.canonicalType}_${number}]`;
      };
    }

    case 'fixed': {
      const masks = { ...BUILTIN_FIXED_MASKS, ...options.fixedMasks };
      const fallback = options.defaultMask ?? FIXED_MASKS.DEFAULT;
      return (candidate) => masks[candidate.canonicalType] ?? fallback;
    }
  }
}

// ============================================================================
// Masking
// ============================================================================

/**
 * Keep candidates in text order. Earlier start wins; at equal start the
 * longer span wins. A candidate partly covered by a kept one is trimmed to
 * its uncovered tail; one covered entirely is skipped.
 */
function selectSpans(text: string, candidates: readonly EntityCandidate[]) {
  const ordered = candidates
    .filter((c) => c.start >= 0 && c.start < c.end && c.end <= text.length)
    .sort((a, b) => a.start - b.start || b.end - a.end);

  const kept: Array<{ candidate: EntityCandidate; span: Span }> = [];
  const skipped: EntityCandidate[] = [];
  let coveredTo = 0;

  for (const candidate of ordered) {
    if (candidate.end <= coveredTo) {
      skipped.push(candidate);
      continue;
    }
    kept.push({ candidate, span: { start: Math.max(candidate.start, coveredTo), end: candidate.end } });
    coveredTo = candidate.end;
  }

  return { kept, skipped };
}

/**
 * Replace candidate spans in the text. Spans are replaced from the end so
 * earlier offsets stay valid.
 *
 * @example
 * maskText('Call 03-1234-5678', [phone(5, 17)], { mode: 'fixed' }).masked;
 * // 'Call ***-****-****'
 */
export function maskText(
  text: string,
  candidates: readonly EntityCandidate[],
  options: MaskOptions = {}
): MaskResult {
  const { kept, skipped } = selectSpans(text, candidates);
  const placeholderFor = createPlaceholderFn(options);

  // Numbering follows text order, so placeholders are chosen before replacing
  const redactions: MaskInfo[] = kept.map(({ candidate, span }) => {
    const value = text.slice(span.start, span.end);
    const info: MaskInfo = {
      type: candidate.canonicalType,
      source: candidate.source,
      placeholder: placeholderFor(candidate, value),
      position: span,
    };
    if (options.trackOriginals) info.originalValue = value;
    return info;
  });

  let masked = text;
  for (let i = redactions.length - 1; i >= 0; i--) {
    const redaction = redactions[i];
    if (redaction === undefined) continue;
    masked =
      masked.substring(0, redaction.position.start) +
      redaction.placeholder +
      masked.substring(redaction.position.end);
  }

  return {
    masked,
    ...(options.trackOriginals ? { original: text } : {}),
    redactions,
    count: redactions.length,
    wasMasked: redactions.length > 0,
    skipped,
  };
}

/**
 * Create a reusable masking function with preset options
 */
export function createMasker(
  options: MaskOptions = {}
): (text: string, candidates: readonly EntityCandidate[]) => MaskResult {
  return (text, candidates) => maskText(text, candidates, options);
}
