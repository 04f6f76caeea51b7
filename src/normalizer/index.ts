/**
 * @module normalizer/index
 * @description Label normalization and token-label decoding
 * @status COMPLETE
 * @lastModified 2026-10-15
 */

export {
  type VocabularyTable,
  type Vocabularies,
  type TagPrefix,
  type ParsedLabel,
  SHARED_VOCABULARY,
  DEFAULT_VOCABULARIES,
  VocabularyTableSchema,
  VocabulariesSchema,
  parseLabel,
  normalize,
  TypeNormalizer,
} from './type-normalizer';

export {
  type TokenLabel,
  type DecodedEntity,
  type DecoderState,
  type StepResult,
  type DecodeResult,
  OUTSIDE,
  step,
  decodeTokenLabels,
} from './bio-decoder';
