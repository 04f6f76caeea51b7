/**
 * @module merge/index
 * @description Deduplication and containment resolution
 * @status COMPLETE
 * @lastModified 2026-10-16
 */

export {
  type MergeOptions,
  type MergeDrop,
  type MergeResult,
  DEFAULT_PRIORITY,
  boundByReference,
  compareCandidates,
  isValidSpan,
  mergeCandidates,
} from './merger';
