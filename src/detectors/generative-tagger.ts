/**
 * @module detectors/generative-tagger
 * @description Detector wrapping a generative model that tags personal data inline
 * @status COMPLETE
 * @dependencies src/detectors/model-backed.ts, src/recovery/tagged-generation.ts
 * @lastModified 2026-10-18
 */

import type { TaggedValue } from '../types/entities';
import { parseTaggedGeneration } from '../recovery/tagged-generation';
import { ModelBackedDetector, type BackendProvider } from './model-backed';
import type { TaggingDetector, TextGenerationBackend } from './types';

export interface GenerativeTaggerOptions {
  name?: string;
  /** Generation context kept on each side of a tag */
  contextChars?: number;
}

export class GenerativeTaggerDetector
  extends ModelBackedDetector<TextGenerationBackend>
  implements TaggingDetector
{
  readonly kind = 'tagging';
  readonly source = 'GENERATIVE';
  private readonly contextChars: number | undefined;

  constructor(provider: BackendProvider<TextGenerationBackend>, options: GenerativeTaggerOptions = {}) {
    super(options.name ?? 'generative', provider);
    this.contextChars = options.contextChars;
  }

  /**
   * Tagged values in generation order. Offsets are not known here.
   */
  async detect(text: string): Promise<TaggedValue[]> {
    const backend = await this.acquire();
    const output = await backend.generate(text);
    return parseTaggedGeneration(output, this.contextChars === undefined ? {} : { contextChars: this.contextChars });
  }
}
