/**
 * @module types/events
 * @description Discard and rejection events reported to the observability sink
 * @status COMPLETE
 * @dependencies src/types/entities.ts
 * @lastModified 2026-10-18
 */

import type { Span } from './common';
import type { DetectorSource, RecoveryDiscardReason } from './entities';

// ============================================================================
// Event Taxonomy
// ============================================================================

export type ConsensusRejectReason = 'TYPE_MISMATCH' | 'INSUFFICIENT_OVERLAP' | 'NO_COUNTERPART';

export type NoiseRejectReason = 'NOISE_CONTENT' | 'ALLOW_LIST_MATCH';

export type MergeDropReason = 'CONTAINED_BY_PRIORITY' | 'INVALID_SPAN' | 'OUTSIDE_NON_STRICT';

export type DetectorFailureReason = 'DETECTOR_ERROR' | 'DETECTOR_TIMEOUT';

/**
 * Map of event category to the reasons it can carry
 */
export interface EventReasons {
  RECOVERY_DISCARD: RecoveryDiscardReason;
  CONSENSUS_REJECT: ConsensusRejectReason;
  NOISE_REJECT: NoiseRejectReason;
  MAPPING_UNKNOWN: 'UNMAPPED_LABEL';
  SCORE_REJECT: 'BELOW_MIN_SCORE';
  MERGE_DROP: MergeDropReason;
  DETECTOR_FAILURE: DetectorFailureReason;
}

export type EventCategory = keyof EventReasons;

/**
 * A local, recoverable decision the pipeline made. Never surfaced as a failure.
 */
export type ReconcileEvent = {
  [C in EventCategory]: {
    category: C;
    reason: EventReasons[C];
    source: DetectorSource;
    /** Value text (for generative tags) */
    value?: string;
    /** Span in the source text, when the event concerns one */
    span?: Span;
    /** Raw label or tag */
    rawType?: string;
    /** Free-form explanation */
    detail?: string;
  };
}[EventCategory];

/**
 * Receives pipeline events. Calls are synchronous; implementations may throw,
 * but a throwing sink never changes what the pipeline returns.
 */
export interface ObservabilitySink {
  record(event: ReconcileEvent): void;
}
