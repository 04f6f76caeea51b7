/**
 * @module detectors/token-classifier
 * @description NER/transformer detector decoding token labels into spans
 * @status COMPLETE
 * @dependencies src/detectors/model-backed.ts, src/normalizer/bio-decoder.ts
 * @lastModified 2026-10-18
 */

import type { OffsetSource, RawDetection } from '../types/entities';
import { decodeTokenLabels } from '../normalizer/bio-decoder';
import { DEFAULT_VOCABULARIES, type Vocabularies } from '../normalizer/type-normalizer';
import { DETECTOR_DEFAULTS } from '../constants';
import { ModelBackedDetector, type BackendProvider } from './model-backed';
import type { SpanDetector, TokenClassifierBackend } from './types';

export interface TokenClassifierOptions {
  name?: string;
  source: Extract<OffsetSource, 'NER' | 'TRANSFORMER'>;
  /** Vocabulary the model's labels are read through (defaults to the source name) */
  vocabulary?: string;
  vocabularies?: Vocabularies;
  /** Entities whose mean token score is lower are dropped */
  minConfidence?: number;
}

/**
 * Runs a token-classification backend and decodes B-/I-/E-/S- labels into
 * entity spans. Labels the vocabulary cannot map end the open entity and are
 * not reported; the reconciler normalizes whatever is.
 */
export class TokenClassifierDetector
  extends ModelBackedDetector<TokenClassifierBackend>
  implements SpanDetector
{
  readonly kind = 'span';
  readonly source: TokenClassifierOptions['source'];
  private readonly vocabulary: string;
  private readonly vocabularies: Vocabularies;
  private readonly minConfidence: number;

  constructor(provider: BackendProvider<TokenClassifierBackend>, options: TokenClassifierOptions) {
    super(options.name ?? options.source.toLowerCase(), provider);
    this.source = options.source;
    this.vocabulary = options.vocabulary ?? options.source.toLowerCase();
    this.vocabularies = options.vocabularies ?? DEFAULT_VOCABULARIES;
    this.minConfidence = options.minConfidence ?? DETECTOR_DEFAULTS.MIN_TOKEN_CONFIDENCE;
  }

  async detect(text: string): Promise<RawDetection[]> {
    const backend = await this.acquire();
    const tokens = await backend.classify(text);
    const { entities } = decodeTokenLabels(tokens, this.vocabulary, this.vocabularies);

    return entities
      .filter((entity) => entity.score >= this.minConfidence)
      .map((entity) => ({
        start: entity.start,
        end: entity.end,
        rawType: entity.rawType,
        score: entity.score,
        source: this.source,
      }));
  }
}
