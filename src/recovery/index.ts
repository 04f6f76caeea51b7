/**
 * @module recovery/index
 * @description Offset recovery for the generative detector
 * @status COMPLETE
 * @lastModified 2026-10-16
 */

export {
  type FuzzyThresholds,
  type RecoveryOptions,
  type RecoveryDiscard,
  type RecoveryResult,
  DEFAULT_RECOVERY_OPTIONS,
  fuzzyThreshold,
  locateTaggedValue,
  recoverSpans,
} from './span-recovery';

export { type ParseOptions, parseTaggedGeneration } from './tagged-generation';

export {
  type FoldedView,
  buildFoldedView,
  editDistance,
  findInView,
  foldChar,
  foldString,
  isSkippable,
  similarity,
  trimToContent,
  trimWhitespace,
} from './text-fold';
