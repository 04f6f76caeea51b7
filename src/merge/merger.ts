/**
 * @module merge/merger
 * @description Collapse overlapping same-type candidates and resolve cross-type containment
 * @status COMPLETE
 * @dependencies src/types/entities.ts, src/types/common.ts
 * @lastModified 2026-10-18
 */

import type { CanonicalType, EntityCandidate } from '../types/entities';
import type { MergeDropReason } from '../types/events';
import { containsSpan, spanLength } from '../types/common';

// ============================================================================
// Types
// ============================================================================

/**
 * Containment priority, highest first. Types not listed rank below all
 * listed ones.
 */
export const DEFAULT_PRIORITY: readonly CanonicalType[] = [
  'EMAIL',
  'PHONE',
  'ZIP_CODE',
  'CUSTOMER_ID',
  'DATE_OF_BIRTH',
  'LOCATION',
  'ORGANIZATION',
  'PERSON',
  'AGE',
  'GENDER',
  'UNKNOWN',
];

export interface MergeOptions {
  priority: readonly CanonicalType[];
}

export interface MergeDrop {
  candidate: EntityCandidate;
  reason: MergeDropReason;
  detail?: string;
}

export interface MergeResult {
  /** Sorted by start, then score descending */
  candidates: EntityCandidate[];
  dropped: MergeDrop[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * True for a span that fits `[0, textLength]` with integer bounds and at
 * least one character
 */
export function isValidSpan(candidate: EntityCandidate, textLength: number): boolean {
  return (
    Number.isInteger(candidate.start) &&
    Number.isInteger(candidate.end) &&
    candidate.start >= 0 &&
    candidate.start < candidate.end &&
    candidate.end <= textLength
  );
}

/**
 * Sort order used by the merger. Ties beyond start and score fall back to
 * end, type and source so the order never depends on input order.
 */
export function compareCandidates(a: EntityCandidate, b: EntityCandidate): number {
  if (a.start !== b.start) return a.start - b.start;
  if (a.score !== b.score) return b.score - a.score;
  if (a.end !== b.end) return b.end - a.end;
  if (a.canonicalType !== b.canonicalType) return a.canonicalType < b.canonicalType ? -1 : 1;
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return 0;
}

function rankOf(priority: readonly CanonicalType[]): (type: CanonicalType) => number {
  return (type) => {
    const index = priority.indexOf(type);
    return index < 0 ? priority.length : index;
  };
}

function describe(candidate: EntityCandidate): string {
  return `${candidate.canonicalType}[${candidate.start},${candidate.end})`;
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Join same-type candidates that overlap or touch. The higher-scoring one
 * supplies source and raw type.
 */
function mergeSameType(sorted: readonly EntityCandidate[]): EntityCandidate[] {
  const accepted: EntityCandidate[] = [];
  const lastIndexByType = new Map<CanonicalType, number>();

  for (const candidate of sorted) {
    const lastIndex = lastIndexByType.get(candidate.canonicalType);
    const last = lastIndex === undefined ? undefined : accepted[lastIndex];

    if (lastIndex !== undefined && last && candidate.start <= last.end) {
      const winner = candidate.score > last.score ? candidate : last;
      accepted[lastIndex] = {
        ...winner,
        start: last.start,
        end: Math.max(last.end, candidate.end),
        score: Math.max(last.score, candidate.score),
      };
      continue;
    }

    lastIndexByType.set(candidate.canonicalType, accepted.length);
    accepted.push(candidate);
  }

  return accepted;
}

/**
 * Deduplicate and merge candidates.
 *
 * 1. Drop invalid spans.
 * 2. Sort by (start asc, score desc) and merge same-type overlaps/adjacency.
 * 3. Where one candidate fully contains another of a different type, drop the
 *    contained one if it ranks lower in `priority`.
 *
 * Idempotent: merging the output again returns it unchanged.
 *
 * @example
 * mergeCandidates([phone(5, 20), person(8, 12)], 30, { priority: DEFAULT_PRIORITY });
 * // candidates: [phone(5, 20)], dropped: [{ candidate: person(8, 12), reason: 'CONTAINED_BY_PRIORITY' }]
 */
export function mergeCandidates(
  candidates: readonly EntityCandidate[],
  textLength: number,
  options: MergeOptions = { priority: DEFAULT_PRIORITY }
): MergeResult {
  const dropped: MergeDrop[] = [];
  const valid: EntityCandidate[] = [];

  for (const candidate of candidates) {
    if (isValidSpan(candidate, textLength)) {
      valid.push(candidate);
    } else {
      dropped.push({
        candidate,
        reason: 'INVALID_SPAN',
        detail: `[${candidate.start},${candidate.end}) outside text of length ${textLength}`,
      });
    }
  }

  const merged = mergeSameType([...valid].sort(compareCandidates)).sort(compareCandidates);
  const rank = rankOf(options.priority);

  const kept = merged.filter((candidate) => {
    const container = merged.find(
      (other) =>
        other !== candidate &&
        other.canonicalType !== candidate.canonicalType &&
        containsSpan(other, candidate) &&
        rank(other.canonicalType) < rank(candidate.canonicalType)
    );
    if (!container) return true;

    dropped.push({
      candidate,
      reason: 'CONTAINED_BY_PRIORITY',
      detail: `contained by ${describe(container)}`,
    });
    return false;
  });

  return { candidates: kept, dropped };
}

// ============================================================================
// Bounding
// ============================================================================

/**
 * Keep at most one candidate per reference candidate: the highest-scoring
 * (then longest) one of the same type lying inside it. Used to cap strict
 * output by the non-strict output of the same request.
 */
export function boundByReference(
  candidates: readonly EntityCandidate[],
  reference: readonly EntityCandidate[]
): MergeResult {
  const kept = new Set<EntityCandidate>();

  for (const bound of reference) {
    let best: EntityCandidate | undefined;
    for (const candidate of candidates) {
      if (kept.has(candidate)) continue;
      if (candidate.canonicalType !== bound.canonicalType || !containsSpan(bound, candidate)) continue;
      if (
        !best ||
        candidate.score > best.score ||
        (candidate.score === best.score && spanLength(candidate) > spanLength(best))
      ) {
        best = candidate;
      }
    }
    if (best) kept.add(best);
  }

  const result: MergeResult = { candidates: [], dropped: [] };
  for (const candidate of candidates) {
    if (kept.has(candidate)) {
      result.candidates.push(candidate);
      continue;
    }
    const container = reference.find((bound) => bound.canonicalType === candidate.canonicalType && containsSpan(bound, candidate));
    result.dropped.push({
      candidate,
      reason: 'OUTSIDE_NON_STRICT',
      detail: container ? `shares ${describe(container)} with a stronger candidate` : 'no same-type non-strict candidate covers it',
    });
  }

  return result;
}
