/**
 * @module consensus/consensus-engine
 * @description Strict-mode agreement between two independent detector sides
 * @status COMPLETE
 * @dependencies src/types/entities.ts, src/types/common.ts
 * @lastModified 2026-10-16
 *
 * A candidate survives strict mode only when a candidate from the other side
 * has the same canonical type and overlaps at least `threshold` of the
 * shorter span. Overlap alone, with different types, is never agreement.
 */

import type {
  CanonicalType,
  ConsensusRecord,
  DetectorSource,
  EntityCandidate,
} from '../types/entities';
import type { ConsensusRejectReason } from '../types/events';
import { overlapLength, spanLength } from '../types/common';
import { CONSENSUS_DEFAULTS } from '../constants';

// ============================================================================
// Types
// ============================================================================

export interface ConsensusOptions {
  /** Share of the shorter span the overlap must cover */
  threshold: number;
  /** Sources on the primary (A) side */
  primarySources: readonly DetectorSource[];
  /** Sources on the secondary (B) side */
  secondarySources: readonly DetectorSource[];
  /** Types passed through untouched */
  exemptTypes: readonly CanonicalType[];
}

export const DEFAULT_CONSENSUS_OPTIONS: ConsensusOptions = {
  threshold: CONSENSUS_DEFAULTS.AGREEMENT_THRESHOLD,
  primarySources: ['PATTERN', 'NER'],
  secondarySources: ['TRANSFORMER', 'GENERATIVE'],
  exemptTypes: [],
};

export interface ConsensusRejection {
  candidate: EntityCandidate;
  reason: ConsensusRejectReason;
  detail?: string;
}

export interface ConsensusResult {
  /** Consensus records followed by exempt candidates */
  candidates: EntityCandidate[];
  rejected: ConsensusRejection[];
}

/**
 * How two candidates relate
 */
export type PairRelation = 'AGREE' | 'TYPE_MISMATCH' | 'INSUFFICIENT_OVERLAP' | 'DISJOINT';

// ============================================================================
// Agreement
// ============================================================================

/**
 * Relation between two candidates under the agreement rule
 *
 * @example
 * classifyPair(
 *   { start: 0, end: 4, canonicalType: 'PERSON', ... },
 *   { start: 0, end: 4, canonicalType: 'PERSON', ... },
 *   0.5
 * ); // 'AGREE'
 */
export function classifyPair(a: EntityCandidate, b: EntityCandidate, threshold: number): PairRelation {
  const overlap = overlapLength(a, b);
  if (overlap === 0) return 'DISJOINT';
  if (a.canonicalType !== b.canonicalType) return 'TYPE_MISMATCH';

  const shorter = Math.min(spanLength(a), spanLength(b));
  return overlap >= threshold * shorter ? 'AGREE' : 'INSUFFICIENT_OVERLAP';
}

/**
 * True when the two candidates describe the same entity
 */
export function agrees(a: EntityCandidate, b: EntityCandidate, threshold: number): boolean {
  return classifyPair(a, b, threshold) === 'AGREE';
}

/**
 * Ordering of agreeing counterparts: higher score, larger overlap, earlier start
 */
function compareCounterparts(anchor: EntityCandidate, x: EntityCandidate, y: EntityCandidate): number {
  if (x.score !== y.score) return y.score - x.score;
  const overlapDiff = overlapLength(anchor, y) - overlapLength(anchor, x);
  if (overlapDiff !== 0) return overlapDiff;
  return x.start - y.start;
}

/**
 * Merge an agreeing pair into one record: union span, max score
 */
export function toConsensusRecord(a: EntityCandidate, b: EntityCandidate): ConsensusRecord {
  const winner = b.score > a.score ? b : a;
  return {
    start: Math.min(a.start, b.start),
    end: Math.max(a.end, b.end),
    canonicalType: a.canonicalType,
    rawType: winner.rawType,
    score: Math.max(a.score, b.score),
    source: 'CONSENSUS',
    agreedRawTypes: [a.rawType, b.rawType],
    agreedSources: [a.source, b.source],
  };
}

/**
 * Why a candidate found no counterpart on the other side
 */
function rejectionFor(
  candidate: EntityCandidate,
  others: readonly EntityCandidate[],
  threshold: number
): ConsensusRejection {
  const relations = others.map((other) => ({ other, relation: classifyPair(candidate, other, threshold) }));

  const partial = relations.find((r) => r.relation === 'INSUFFICIENT_OVERLAP');
  if (partial) {
    return {
      candidate,
      reason: 'INSUFFICIENT_OVERLAP',
      detail: `overlap ${overlapLength(candidate, partial.other)} with ${partial.other.source}[${partial.other.start},${partial.other.end})`,
    };
  }

  const mismatch = relations.find((r) => r.relation === 'TYPE_MISMATCH');
  if (mismatch) {
    return {
      candidate,
      reason: 'TYPE_MISMATCH',
      detail: `overlaps ${mismatch.other.canonicalType} from ${mismatch.other.source}`,
    };
  }

  return { candidate, reason: 'NO_COUNTERPART' };
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Apply strict-mode consensus.
 *
 * Every primary candidate pairs with its best agreeing secondary candidate.
 * A secondary candidate may back several primary ones. Candidates from
 * sources on neither side never agree with anything.
 */
export function buildConsensus(
  candidates: readonly EntityCandidate[],
  options: ConsensusOptions = DEFAULT_CONSENSUS_OPTIONS
): ConsensusResult {
  const exempt = new Set(options.exemptTypes);
  const primarySet = new Set(options.primarySources);
  const secondarySet = new Set(options.secondarySources);

  const passthrough: EntityCandidate[] = [];
  const primary: EntityCandidate[] = [];
  const secondary: EntityCandidate[] = [];
  const unsided: EntityCandidate[] = [];

  for (const candidate of candidates) {
    if (exempt.has(candidate.canonicalType)) passthrough.push(candidate);
    else if (primarySet.has(candidate.source)) primary.push(candidate);
    else if (secondarySet.has(candidate.source)) secondary.push(candidate);
    else unsided.push(candidate);
  }

  const records: ConsensusRecord[] = [];
  const rejected: ConsensusRejection[] = [];
  const usedSecondary = new Set<EntityCandidate>();

  for (const a of primary) {
    const agreeing = secondary.filter((b) => agrees(a, b, options.threshold));
    if (agreeing.length === 0) {
      rejected.push(rejectionFor(a, secondary, options.threshold));
      continue;
    }

    const [best] = [...agreeing].sort((x, y) => compareCounterparts(a, x, y));
    if (!best) continue;
    usedSecondary.add(best);
    records.push(toConsensusRecord(a, best));
  }

  for (const b of secondary) {
    if (usedSecondary.has(b)) continue;
    if (primary.some((a) => agrees(a, b, options.threshold))) {
      // agreed, but another counterpart ranked higher for every partner
      rejected.push({ candidate: b, reason: 'NO_COUNTERPART', detail: 'outranked by another agreeing candidate' });
      continue;
    }
    rejected.push(rejectionFor(b, primary, options.threshold));
  }

  for (const c of unsided) {
    rejected.push({ candidate: c, reason: 'NO_COUNTERPART', detail: `${c.source} is on neither consensus side` });
  }

  return { candidates: [...records, ...passthrough], rejected };
}
