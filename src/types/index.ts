/**
 * @module types/index
 * @description Central export for all type definitions
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-14
 */

// Common types
export type {
  Result,
  AppError,
  InputError,
  InputErrorCode,
  ConfigurationErrorCode,
  Span,
} from './common';

export {
  ok,
  err,
  toError,
  ConfigurationError,
  overlapLength,
  spanLength,
  containsSpan,
  clampScore,
} from './common';

// Entity types
export type {
  CanonicalType,
  DetectorSource,
  OffsetSource,
  RawDetection,
  TaggedValue,
  DetectorOutputs,
  EntityCandidate,
  ConsensusRecord,
  RecoveryDiscardReason,
  RecoveryMethod,
  RecoveryOutcome,
} from './entities';

export {
  CANONICAL_TYPES,
  DETECTOR_SOURCES,
  OFFSET_SOURCES,
  isCanonicalType,
  isConsensusRecord,
  candidateText,
} from './entities';

// Event types
export type {
  ConsensusRejectReason,
  NoiseRejectReason,
  MergeDropReason,
  DetectorFailureReason,
  EventReasons,
  EventCategory,
  ReconcileEvent,
  ObservabilitySink,
} from './events';
