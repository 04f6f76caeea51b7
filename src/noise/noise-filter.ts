/**
 * @module noise/noise-filter
 * @description Drop degenerate candidates and allow-listed terms
 * @status COMPLETE
 * @dependencies src/types/entities.ts
 * @lastModified 2026-10-18
 */

import { candidateText, type EntityCandidate } from '../types/entities';
import type { NoiseRejectReason } from '../types/events';
import { NOISE_DEFAULTS } from '../constants';
import { normalizeTerm } from './allow-list';

// ============================================================================
// Types
// ============================================================================

export interface NoiseOptions {
  /** Minimum share of non-whitespace, non-punctuation characters */
  minContentRatio: number;
  /** Normalized terms that are never reported */
  allowList: ReadonlySet<string>;
}

export const DEFAULT_NOISE_OPTIONS: NoiseOptions = {
  minContentRatio: NOISE_DEFAULTS.MIN_CONTENT_RATIO,
  allowList: new Set(),
};

export interface NoiseRejection {
  candidate: EntityCandidate;
  reason: NoiseRejectReason;
  detail?: string;
}

export interface NoiseResult {
  candidates: EntityCandidate[];
  rejected: NoiseRejection[];
}

/**
 * Character counts for one value, in code points
 */
export interface ContentStats {
  length: number;
  /** Letters, digits, ideographs and `_` */
  wordChars: number;
  /** Anything that is not whitespace, punctuation or a symbol */
  contentChars: number;
}

// ============================================================================
// Content Analysis
// ============================================================================

const WORD_CHAR_RE = /[\p{L}\p{N}\p{Ideographic}_]/u;
/**
 * Whitespace, punctuation and symbols. Symbols (\p{S}: "~", "+", "¥", "〒")
 * are non-content alongside punctuation, so "~\n\n" has no content at all.
 */
const NON_CONTENT_RE = /[\s\p{P}\p{S}]/u;

export function contentStats(value: string): ContentStats {
  let length = 0;
  let wordChars = 0;
  let contentChars = 0;

  for (const char of value) {
    length++;
    if (WORD_CHAR_RE.test(char)) wordChars++;
    if (!NON_CONTENT_RE.test(char)) contentChars++;
  }

  return { length, wordChars, contentChars };
}

/**
 * True when a value has no word character, or too little content
 *
 * @example
 * isNoise('~\n\n', 0.5);     // true
 * isNoise('03-1234', 0.5);   // false
 */
export function isNoise(value: string, minContentRatio: number): boolean {
  const stats = contentStats(value);
  if (stats.length === 0 || stats.wordChars === 0) return true;
  return stats.contentChars / stats.length < minContentRatio;
}

// ============================================================================
// Filter
// ============================================================================

/**
 * Apply the noise and allow-list checks to every candidate
 */
export function filterNoise(
  text: string,
  candidates: readonly EntityCandidate[],
  options: NoiseOptions = DEFAULT_NOISE_OPTIONS
): NoiseResult {
  const kept: EntityCandidate[] = [];
  const rejected: NoiseRejection[] = [];

  for (const candidate of candidates) {
    const value = candidateText(text, candidate);

    if (isNoise(value, options.minContentRatio)) {
      const stats = contentStats(value);
      rejected.push({
        candidate,
        reason: 'NOISE_CONTENT',
        detail: `${stats.contentChars}/${stats.length} content chars`,
      });
      continue;
    }

    if (options.allowList.size > 0 && options.allowList.has(normalizeTerm(value))) {
      rejected.push({ candidate, reason: 'ALLOW_LIST_MATCH' });
      continue;
    }

    kept.push(candidate);
  }

  return { candidates: kept, rejected };
}
