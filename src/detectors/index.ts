/**
 * @module detectors
 * @description Detector contracts, implementations and fan-out
 * @status COMPLETE
 * @dependencies src/detectors/*
 * @lastModified 2026-10-18
 */

export type {
  Detector,
  SpanDetector,
  TaggingDetector,
  TokenClassifierBackend,
  TextGenerationBackend,
} from './types';

export { ModelBackedDetector, type BackendProvider } from './model-backed';

export { TokenClassifierDetector, type TokenClassifierOptions } from './token-classifier';

export { GenerativeTaggerDetector, type GenerativeTaggerOptions } from './generative-tagger';

export {
  type RecognizerPattern,
  ALL_PATTERNS,
  EMAIL_PATTERN,
  JP_PHONE_PATTERN,
  JP_MOBILE_PATTERN,
  JP_INTERNATIONAL_PHONE_PATTERN,
  US_PHONE_PATTERN,
  JP_ZIP_PATTERN,
  US_ZIP_PATTERN,
  SLASH_DATE_PATTERN,
  HYPHEN_DATE_PATTERN,
  KANJI_DATE_PATTERN,
  ERA_DATE_PATTERN,
  JP_AGE_PATTERN,
  JP_GENDER_BRACKETED_PATTERN,
  JP_GENDER_PATTERN,
  CUSTOMER_ID_PATTERN,
  createCustomPattern,
} from './patterns';

export { PatternDetector, hasContext, type PatternDetectorOptions } from './pattern-detector';

export { runDetectors, DetectorTimeoutError, type RunDetectorsOptions } from './orchestrator';

export { DetectionService, type DetectionServiceOptions, type AnalysisResult } from './detection-service';
