/**
 * @module recovery/span-recovery
 * @description Align generative tagged values back onto exact offsets in the source text
 * @status COMPLETE
 * @dependencies src/recovery/text-fold.ts, src/types/entities.ts
 * @lastModified 2026-10-16
 *
 * The generative model rewrites the document, so its tags carry no offsets.
 * Each tagged value is located by, in order:
 * 1. exact substring search from the consumption pointer
 * 2. the same search on a folded view (no whitespace/punctuation, NFKC, lowercase)
 * 3. generation context used as anchors around the value
 *
 * Anything uncertain is discarded with a reason. The pointer only moves
 * forward, past each accepted span.
 */

import type {
  CanonicalType,
  EntityCandidate,
  RecoveryDiscardReason,
  RecoveryOutcome,
  TaggedValue,
} from '../types/entities';
import { clampScore } from '../types/common';
import { DISPLAY_LIMITS, FUZZY_THRESHOLDS, MAX_SPAN_BY_TYPE, RECOVERY_DEFAULTS } from '../constants';
import { preview } from '../observability/sinks';
import {
  buildFoldedView,
  findInView,
  foldString,
  isSkippable,
  similarity,
  trimWhitespace,
  type FoldedView,
} from './text-fold';

// ============================================================================
// Options
// ============================================================================

export interface FuzzyThresholds {
  shortMaxLength: number;
  midMaxLength: number;
  short: number;
  mid: number;
  long: number;
}

export interface RecoveryOptions {
  /** Allowed relative length deviation of an anchored match */
  lengthTolerance: number;
  /** Characters scanned next to a single anchor */
  searchWindow: number;
  /** Score of a perfect match */
  baseScore: number;
  /** Characters of generation context used as an anchor */
  anchorChars: number;
  fuzzyThresholds: FuzzyThresholds;
  maxSpanByType: Readonly<Partial<Record<CanonicalType, number>>>;
  maxSpanDefault: number;
}

export const DEFAULT_RECOVERY_OPTIONS: RecoveryOptions = {
  lengthTolerance: RECOVERY_DEFAULTS.LENGTH_TOLERANCE,
  searchWindow: RECOVERY_DEFAULTS.SEARCH_WINDOW,
  baseScore: RECOVERY_DEFAULTS.BASE_SCORE,
  anchorChars: RECOVERY_DEFAULTS.ANCHOR_CHARS,
  fuzzyThresholds: {
    shortMaxLength: FUZZY_THRESHOLDS.SHORT_MAX_LENGTH,
    midMaxLength: FUZZY_THRESHOLDS.MID_MAX_LENGTH,
    short: FUZZY_THRESHOLDS.SHORT,
    mid: FUZZY_THRESHOLDS.MID,
    long: FUZZY_THRESHOLDS.LONG,
  },
  maxSpanByType: MAX_SPAN_BY_TYPE,
  maxSpanDefault: RECOVERY_DEFAULTS.MAX_SPAN_DEFAULT,
};

/**
 * Minimum similarity for a value of the given length (in characters)
 */
export function fuzzyThreshold(length: number, thresholds: FuzzyThresholds): number {
  if (length <= thresholds.shortMaxLength) return thresholds.short;
  if (length <= thresholds.midMaxLength) return thresholds.mid;
  return thresholds.long;
}

// ============================================================================
// Results
// ============================================================================

/**
 * A tagged value that could not be placed
 */
export interface RecoveryDiscard {
  value: string;
  tag: string;
  reason: RecoveryDiscardReason;
  detail?: string;
}

export interface RecoveryResult {
  /** GENERATIVE candidates, in generation order */
  candidates: EntityCandidate[];
  discards: RecoveryDiscard[];
}

function discarded(reason: RecoveryDiscardReason, detail?: string): RecoveryOutcome {
  return detail === undefined ? { kind: 'DISCARDED', reason } : { kind: 'DISCARDED', reason, detail };
}

// ============================================================================
// Anchors
// ============================================================================

interface Found {
  start: number;
  end: number;
}

/**
 * Lazily-built folded view of the text from the pointer onwards
 */
class TextIndex {
  private view: FoldedView | null = null;

  constructor(readonly text: string, readonly from: number) {}

  private folded(): FoldedView {
    if (!this.view) {
      this.view = buildFoldedView(this.text, this.from);
    }
    return this.view;
  }

  /**
   * First occurrence of `needle` at or after `at`, exact first, folded second
   */
  find(needle: string, at: number): Found | null {
    const exact = this.text.indexOf(needle, at);
    if (exact >= 0) return { start: exact, end: exact + needle.length };

    const foldedNeedle = foldString(needle);
    if (foldedNeedle.length === 0) return null;

    const view = this.folded();
    let position = 0;
    while (position < view.starts.length && (view.starts[position] ?? 0) < at) position++;
    return findInView(view, foldedNeedle, position);
  }
}

function lastChars(value: string, count: number): string {
  const chars = Array.from(value);
  return chars.slice(Math.max(0, chars.length - count)).join('');
}

function firstChars(value: string, count: number): string {
  return Array.from(value).slice(0, count).join('');
}

/**
 * Context usable as an anchor: trimmed, bounded and with some content
 */
function anchorText(context: string | undefined, take: (value: string) => string): string | null {
  if (context === undefined) return null;
  const anchor = take(context.trim()).trim();
  return foldString(anchor).length > 0 ? anchor : null;
}

// ============================================================================
// Fuzzy Scan
// ============================================================================

interface ScanHit {
  start: number;
  end: number;
  score: number;
}

function lengthBounds(valueLength: number, tolerance: number): { min: number; max: number } {
  return {
    min: Math.max(1, Math.ceil(valueLength * (1 - tolerance))),
    max: Math.floor(valueLength * (1 + tolerance)),
  };
}

/**
 * Pick the single best hit. Ties at the top are ambiguous.
 */
function bestHit(hits: ScanHit[], threshold: number): RecoveryOutcome {
  let best: ScanHit | undefined;
  let tied = 0;
  for (const hit of hits) {
    if (!best || hit.score > best.score + 1e-9) {
      best = hit;
      tied = 1;
    } else if (Math.abs(hit.score - best.score) <= 1e-9) {
      tied++;
    }
  }

  if (!best || best.score < threshold) {
    return discarded('NO_MATCH', best ? `best similarity ${best.score.toFixed(2)}` : undefined);
  }
  if (tied > 1) {
    return discarded('AMBIGUOUS_MATCH', `${tied} spans at similarity ${best.score.toFixed(2)}`);
  }
  return { kind: 'RECOVERED', start: best.start, end: best.end, method: 'ANCHORED', quality: best.score };
}

/**
 * Spans that start right after a left anchor
 */
function scanAfter(text: string, anchorEnd: number, value: string, options: RecoveryOptions): RecoveryOutcome {
  const windowEnd = Math.min(text.length, anchorEnd + options.searchWindow);
  let start = anchorEnd;
  while (start < windowEnd && isSkippable(text.charAt(start))) start++;

  const { min, max } = lengthBounds(value.length, options.lengthTolerance);
  const foldedValue = foldString(value);
  const hits: ScanHit[] = [];

  for (let length = min; length <= max && start + length <= windowEnd; length++) {
    const end = start + length;
    if (isSkippable(text.charAt(end - 1))) continue;
    hits.push({ start, end, score: similarity(foldedValue, foldString(text.slice(start, end))) });
  }

  if (start + min > windowEnd) {
    return discarded('LENGTH_MISMATCH', 'window shorter than the value');
  }
  return bestHit(hits, fuzzyThreshold(Array.from(value).length, options.fuzzyThresholds));
}

/**
 * Spans that end right before a right anchor
 */
function scanBefore(
  text: string,
  anchorStart: number,
  floor: number,
  value: string,
  options: RecoveryOptions
): RecoveryOutcome {
  const windowStart = Math.max(floor, anchorStart - options.searchWindow);
  let end = anchorStart;
  while (end > windowStart && isSkippable(text.charAt(end - 1))) end--;

  const { min, max } = lengthBounds(value.length, options.lengthTolerance);
  const foldedValue = foldString(value);
  const hits: ScanHit[] = [];

  for (let length = min; length <= max && end - length >= windowStart; length++) {
    const start = end - length;
    if (isSkippable(text.charAt(start))) continue;
    hits.push({ start, end, score: similarity(foldedValue, foldString(text.slice(start, end))) });
  }

  if (end - min < windowStart) {
    return discarded('LENGTH_MISMATCH', 'window shorter than the value');
  }
  return bestHit(hits, fuzzyThreshold(Array.from(value).length, options.fuzzyThresholds));
}

// ============================================================================
// Location
// ============================================================================

function locateByAnchors(
  index: TextIndex,
  item: TaggedValue,
  value: string,
  cursor: number,
  options: RecoveryOptions
): RecoveryOutcome {
  const left = anchorText(item.leftContext, (c) => lastChars(c, options.anchorChars));
  const right = anchorText(item.rightContext, (c) => firstChars(c, options.anchorChars));
  if (left === null && right === null) {
    return discarded('ANCHOR_MISSING', 'no context');
  }

  let leftHit: Found | null = null;
  if (left !== null) {
    leftHit = index.find(left, cursor);
    if (!leftHit) return discarded('ANCHOR_MISSING', `left anchor "${preview(left)}" not found`);
  }

  let rightHit: Found | null = null;
  if (right !== null) {
    rightHit = index.find(right, leftHit ? leftHit.end : cursor);
    if (!rightHit) return discarded('ANCHOR_MISSING', `right anchor "${preview(right)}" not found`);
  }

  if (leftHit && rightHit) {
    const gap = trimWhitespace(index.text, leftHit.end, rightHit.start);
    if (!gap) return discarded('NO_MATCH', 'anchors leave no gap');

    const gapLength = gap.end - gap.start;
    const deviation = Math.abs(gapLength - value.length) / value.length;
    if (deviation > options.lengthTolerance) {
      return discarded('LENGTH_MISMATCH', `gap of ${gapLength} chars for a value of ${value.length}`);
    }
    return { kind: 'RECOVERED', start: gap.start, end: gap.end, method: 'ANCHORED', quality: 1 - deviation };
  }

  if (leftHit) return scanAfter(index.text, leftHit.end, value, options);
  if (rightHit) return scanBefore(index.text, rightHit.start, cursor, value, options);
  return discarded('ANCHOR_MISSING');
}

/**
 * Locate one tagged value in `text`, searching from `cursor`
 *
 * @example
 * locateTaggedValue('東京都渋谷区 ... 東京都渋谷区', { value: '東京都渋谷区', tag: '<address>' }, 12);
 * // second occurrence: the first lies behind the pointer
 */
export function locateTaggedValue(
  text: string,
  item: TaggedValue,
  cursor: number,
  options: RecoveryOptions = DEFAULT_RECOVERY_OPTIONS
): RecoveryOutcome {
  const value = item.value.trim();
  if (value.length === 0) return discarded('NO_MATCH', 'empty value');

  const exact = text.indexOf(value, cursor);
  if (exact >= 0) {
    return { kind: 'RECOVERED', start: exact, end: exact + value.length, method: 'EXACT', quality: 1 };
  }

  const index = new TextIndex(text, cursor);
  const foldedValue = foldString(value);
  if (foldedValue.length > 0) {
    const hit = index.find(value, cursor);
    if (hit) {
      return {
        kind: 'RECOVERED',
        start: hit.start,
        end: hit.end,
        method: 'NORMALIZED',
        quality: RECOVERY_DEFAULTS.NORMALIZED_QUALITY,
      };
    }
  }

  return locateByAnchors(index, item, value, cursor, options);
}

// ============================================================================
// Recovery
// ============================================================================

function discardDetail(text: string, cursor: number, detail: string | undefined): string {
  const near = preview(text.slice(cursor, cursor + DISPLAY_LIMITS.DISCARD_CONTEXT_CHARS));
  return detail ? `${detail}; pointer ${cursor} at "${near}"` : `pointer ${cursor} at "${near}"`;
}

/**
 * Recover offsets for an ordered sequence of tagged values.
 * Deterministic: the same text and sequence always give the same result.
 *
 * @param resolveTag - Maps a raw tag to its canonical type (UNKNOWN discards the tag)
 */
export function recoverSpans(
  text: string,
  tagged: readonly TaggedValue[],
  resolveTag: (tag: string) => CanonicalType,
  options: RecoveryOptions = DEFAULT_RECOVERY_OPTIONS
): RecoveryResult {
  const candidates: EntityCandidate[] = [];
  const discards: RecoveryDiscard[] = [];
  let cursor = 0;

  for (const item of tagged) {
    const canonicalType = resolveTag(item.tag);
    if (canonicalType === 'UNKNOWN') {
      discards.push({ value: item.value, tag: item.tag, reason: 'TAG_UNRECOGNIZED' });
      continue;
    }

    const outcome = locateTaggedValue(text, item, cursor, options);
    if (outcome.kind === 'DISCARDED') {
      discards.push({
        value: item.value,
        tag: item.tag,
        reason: outcome.reason,
        detail: discardDetail(text, cursor, outcome.detail),
      });
      continue;
    }

    const maxSpan = options.maxSpanByType[canonicalType] ?? options.maxSpanDefault;
    const length = outcome.end - outcome.start;
    if (length > maxSpan) {
      discards.push({
        value: item.value,
        tag: item.tag,
        reason: 'LENGTH_MISMATCH',
        detail: `${canonicalType} span of ${length} chars exceeds ${maxSpan}`,
      });
      continue;
    }

    candidates.push({
      start: outcome.start,
      end: outcome.end,
      canonicalType,
      rawType: item.tag,
      score: clampScore(options.baseScore * outcome.quality),
      source: 'GENERATIVE',
    });
    cursor = outcome.end;
  }

  return { candidates, discards };
}
