/**
 * @module types/entities
 * @description Candidate, detection and tagged-value types shared by every stage
 * @status COMPLETE
 * @dependencies src/types/common.ts
 * @lastModified 2026-10-12
 */

import type { Span } from './common';

// ============================================================================
// Canonical Taxonomy
// ============================================================================

/**
 * Closed set of entity categories used for cross-detector comparison
 */
export const CANONICAL_TYPES = [
  'PERSON',
  'LOCATION',
  'ORGANIZATION',
  'PHONE',
  'EMAIL',
  'ZIP_CODE',
  'DATE_OF_BIRTH',
  'AGE',
  'GENDER',
  'CUSTOMER_ID',
  'UNKNOWN',
] as const;

export type CanonicalType = typeof CANONICAL_TYPES[number];

/**
 * Type guard for canonical type names
 */
export function isCanonicalType(value: string): value is CanonicalType {
  return (CANONICAL_TYPES as readonly string[]).includes(value);
}

// ============================================================================
// Sources
// ============================================================================

export const DETECTOR_SOURCES = ['PATTERN', 'NER', 'TRANSFORMER', 'GENERATIVE', 'CONSENSUS'] as const;

/**
 * Where a candidate came from
 */
export type DetectorSource = typeof DETECTOR_SOURCES[number];

/**
 * Sources that report offsets themselves
 */
export const OFFSET_SOURCES = ['PATTERN', 'NER', 'TRANSFORMER'] as const satisfies readonly DetectorSource[];

export type OffsetSource = typeof OFFSET_SOURCES[number];

// ============================================================================
// Detector Output
// ============================================================================

/**
 * One detection as reported by an offset-producing detector, before any
 * validation or normalization
 */
export interface RawDetection {
  start: number;
  end: number;
  /** Label in the detector's own vocabulary (`B-PER`, `JP_PERSON`, `人名`) */
  rawType: string;
  score: number;
  source: OffsetSource;
}

/**
 * One value tagged by the generative model. The model rewrites the text, so
 * there are no offsets; context is whatever generation text surrounded the tag.
 */
export interface TaggedValue {
  value: string;
  /** Raw tag, e.g. `<name>` */
  tag: string;
  /** Generation text immediately before the tagged value */
  leftContext?: string;
  /** Generation text immediately after the tagged value */
  rightContext?: string;
}

/**
 * Everything the detectors produced for one request
 */
export interface DetectorOutputs {
  detections: readonly RawDetection[];
  /** Ordered generative output (generation order) */
  tagged?: readonly TaggedValue[];
}

// ============================================================================
// Candidates
// ============================================================================

/**
 * A proposed entity span. The covered text is never stored; slice it from the
 * source text with {@link candidateText}.
 */
export interface EntityCandidate extends Span {
  canonicalType: CanonicalType;
  rawType: string;
  /** Confidence in [0, 1] */
  score: number;
  source: DetectorSource;
}

/**
 * A candidate both consensus sides agreed on
 */
export interface ConsensusRecord extends EntityCandidate {
  source: 'CONSENSUS';
  /** Raw types of the agreeing pair, primary side first */
  agreedRawTypes: [string, string];
  /** Sources of the agreeing pair, primary side first */
  agreedSources: [DetectorSource, DetectorSource];
}

/**
 * Narrow a candidate to a consensus record
 */
export function isConsensusRecord(candidate: EntityCandidate): candidate is ConsensusRecord {
  return candidate.source === 'CONSENSUS' && 'agreedRawTypes' in candidate;
}

/**
 * Text covered by a candidate
 */
export function candidateText(text: string, span: Span): string {
  return text.slice(span.start, span.end);
}

// ============================================================================
// Span Recovery Outcome
// ============================================================================

export type RecoveryDiscardReason =
  | 'NO_MATCH'
  | 'AMBIGUOUS_MATCH'
  | 'ANCHOR_MISSING'
  | 'LENGTH_MISMATCH'
  | 'TAG_UNRECOGNIZED';

/**
 * How a recovered span was located
 */
export type RecoveryMethod = 'EXACT' | 'NORMALIZED' | 'ANCHORED';

export type RecoveryOutcome =
  | { kind: 'RECOVERED'; start: number; end: number; method: RecoveryMethod; quality: number }
  | { kind: 'DISCARDED'; reason: RecoveryDiscardReason; detail?: string };
