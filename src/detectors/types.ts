/**
 * @module detectors/types
 * @description Contracts shared by every detector
 * @status COMPLETE
 * @dependencies src/types/entities.ts, src/normalizer/bio-decoder.ts
 * @lastModified 2026-10-18
 */

import type { OffsetSource, RawDetection, TaggedValue } from '../types/entities';
import type { TokenLabel } from '../normalizer/bio-decoder';

// ============================================================================
// Detector Contract
// ============================================================================

interface DetectorLifecycle {
  /** Name used in logs and failure events */
  readonly name: string;
  readonly isReady: boolean;
  /** Acquire whatever the detector runs on. Safe to call repeatedly. */
  load(): Promise<void>;
  /** Release it again */
  dispose(): Promise<void>;
}

/**
 * Detector that reports character offsets itself
 */
export interface SpanDetector extends DetectorLifecycle {
  readonly kind: 'span';
  readonly source: OffsetSource;
  detect(text: string): Promise<RawDetection[]>;
}

/**
 * Detector that rewrites the text with tags; offsets are recovered later
 */
export interface TaggingDetector extends DetectorLifecycle {
  readonly kind: 'tagging';
  readonly source: 'GENERATIVE';
  detect(text: string): Promise<TaggedValue[]>;
}

export type Detector = SpanDetector | TaggingDetector;

// ============================================================================
// Backends
// ============================================================================

/**
 * Token-classification model (NER pipeline, transformer tagger)
 */
export interface TokenClassifierBackend {
  classify(text: string): Promise<TokenLabel[]>;
}

/**
 * Generative model prompted to wrap personal data in tags
 */
export interface TextGenerationBackend {
  generate(text: string): Promise<string>;
}
