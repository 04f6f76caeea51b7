/**
 * @module normalizer/type-normalizer
 * @description Map detector label vocabularies onto the canonical taxonomy
 * @status COMPLETE
 * @dependencies zod, src/types/entities.ts, src/normalizer/default-vocabularies.json
 * @lastModified 2026-10-15
 */

import { z } from 'zod';
import rawVocabularies from './default-vocabularies.json';
import {
  CANONICAL_TYPES,
  isCanonicalType,
  type CanonicalType,
  type DetectorSource,
} from '../types/entities';
import type { EventRecorder } from '../observability/sinks';

// ============================================================================
// Types
// ============================================================================

/**
 * Label → canonical type table for one detector vocabulary
 */
export type VocabularyTable = Readonly<Record<string, CanonicalType>>;

/**
 * Named vocabulary tables. The `shared` table is consulted after the
 * detector's own table.
 */
export type Vocabularies = Readonly<Record<string, VocabularyTable>>;

export const SHARED_VOCABULARY = 'shared';

export const VocabularyTableSchema = z.record(z.string(), z.enum(CANONICAL_TYPES));

export const VocabulariesSchema = z.record(z.string(), VocabularyTableSchema);

/**
 * Tables shipped with the package
 */
export const DEFAULT_VOCABULARIES: Vocabularies = VocabulariesSchema.parse(rawVocabularies);

// ============================================================================
// Label Cleaning
// ============================================================================

/**
 * Tagging-scheme prefixes (BIO, BIOES, BILOU)
 */
export type TagPrefix = 'B' | 'I' | 'E' | 'S' | 'L' | 'U';

const PREFIX_RE = /^([BIESLU])[-_](.+)$/;
const ANGLE_TAG_RE = /^<\/?\s*([^<>]+?)\s*\/?>$/;

export interface ParsedLabel {
  /** Scheme prefix, if the label had one */
  prefix: TagPrefix | null;
  /** Label without prefix or tag brackets */
  label: string;
  /** True for the outside label `O` */
  outside: boolean;
}

/**
 * Split a raw label into its scheme prefix and bare label
 *
 * @example
 * parseLabel('B-PER');   // { prefix: 'B', label: 'PER', outside: false }
 * parseLabel('<name>');  // { prefix: null, label: 'name', outside: false }
 */
export function parseLabel(rawLabel: string): ParsedLabel {
  let label = rawLabel.trim();

  const angle = ANGLE_TAG_RE.exec(label);
  if (angle?.[1] !== undefined) {
    label = angle[1];
  }

  if (label === 'O') {
    return { prefix: null, label, outside: true };
  }

  const prefixed = PREFIX_RE.exec(label);
  if (prefixed?.[1] !== undefined && prefixed[2] !== undefined) {
    return { prefix: toPrefix(prefixed[1]), label: prefixed[2], outside: false };
  }

  return { prefix: null, label, outside: false };
}

function toPrefix(letter: string): TagPrefix | null {
  switch (letter) {
    case 'B':
    case 'I':
    case 'E':
    case 'S':
    case 'L':
    case 'U':
      return letter;
    default:
      return null;
  }
}

// ============================================================================
// Normalization
// ============================================================================

function lookup(table: VocabularyTable | undefined, label: string): CanonicalType | undefined {
  if (!table) return undefined;
  return table[label] ?? table[label.toUpperCase()] ?? table[label.toLowerCase()];
}

/**
 * Resolve a raw label to its canonical type. Total: anything unmapped is
 * UNKNOWN.
 *
 * Lookup order: the vocabulary's own table, the shared table, then the label
 * itself when it already is a canonical type name.
 *
 * @example
 * normalize('B-PER', 'ner');            // 'PERSON'
 * normalize('<post-code>', 'generative'); // 'ZIP_CODE'
 * normalize('MISC', 'ner');             // 'UNKNOWN'
 */
export function normalize(
  rawLabel: string,
  vocabulary: string,
  vocabularies: Vocabularies = DEFAULT_VOCABULARIES
): CanonicalType {
  const { label, outside } = parseLabel(rawLabel);
  if (outside || label.length === 0) return 'UNKNOWN';

  const found =
    lookup(vocabularies[vocabulary], label) ??
    lookup(vocabularies[SHARED_VOCABULARY], label);
  if (found) return found;

  const upper = label.toUpperCase();
  return isCanonicalType(upper) ? upper : 'UNKNOWN';
}

/**
 * Stateful wrapper that reports unmapped labels.
 * One instance per request, bound to that request's event recorder.
 */
export class TypeNormalizer {
  constructor(
    private readonly vocabularies: Vocabularies,
    private readonly sourceVocabulary: Readonly<Partial<Record<DetectorSource, string>>>,
    private readonly recorder: EventRecorder
  ) {}

  /**
   * Vocabulary used for a detector source
   */
  vocabularyFor(source: DetectorSource): string {
    return this.sourceVocabulary[source] ?? SHARED_VOCABULARY;
  }

  /**
   * Canonical type for a label from the given source. Records a
   * MAPPING_UNKNOWN event when the label has no mapping.
   */
  resolve(rawLabel: string, source: DetectorSource): CanonicalType {
    const canonical = normalize(rawLabel, this.vocabularyFor(source), this.vocabularies);
    if (canonical === 'UNKNOWN' && parseLabel(rawLabel).label.toUpperCase() !== 'UNKNOWN') {
      this.recorder.record({
        category: 'MAPPING_UNKNOWN',
        reason: 'UNMAPPED_LABEL',
        source,
        rawType: rawLabel,
        detail: `no mapping in vocabulary "${this.vocabularyFor(source)}"`,
      });
    }
    return canonical;
  }
}
