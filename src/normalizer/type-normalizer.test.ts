/**
 * @module normalizer/type-normalizer.test
 * @description Unit tests for label normalization
 * @status COMPLETE
 * @dependencies src/normalizer/type-normalizer.ts
 * @lastModified 2026-10-15
 */

import { describe, it, expect } from 'vitest';
import { normalize, parseLabel, TypeNormalizer, VocabulariesSchema } from './type-normalizer';
import { CollectingSink, EventRecorder } from '../observability/sinks';

describe('normalizer/type-normalizer', () => {
  describe('parseLabel', () => {
    it('should split BIO prefixes', () => {
      expect(parseLabel('B-PER')).toEqual({ prefix: 'B', label: 'PER', outside: false });
      expect(parseLabel('I-人名')).toEqual({ prefix: 'I', label: '人名', outside: false });
    });

    it('should accept BIOES and BILOU prefixes', () => {
      expect(parseLabel('E-ORG').prefix).toBe('E');
      expect(parseLabel('S_LOC').prefix).toBe('S');
      expect(parseLabel('U-PER').prefix).toBe('U');
    });

    it('should strip generative tag brackets', () => {
      expect(parseLabel('<phone-number>')).toEqual({ prefix: null, label: 'phone-number', outside: false });
      expect(parseLabel('</name>').label).toBe('name');
    });

    it('should recognize the outside label', () => {
      expect(parseLabel('O').outside).toBe(true);
      expect(parseLabel(' O ').outside).toBe(true);
    });

    it('should leave labels that only look prefixed alone', () => {
      expect(parseLabel('BIRTHDAY')).toEqual({ prefix: null, label: 'BIRTHDAY', outside: false });
    });
  });

  describe('normalize', () => {
    it('should map vocabulary-specific labels', () => {
      expect(normalize('B-PER', 'ner')).toBe('PERSON');
      expect(normalize('GPE', 'ner')).toBe('LOCATION');
      expect(normalize('法人名', 'transformer')).toBe('ORGANIZATION');
      expect(normalize('<post-code>', 'generative')).toBe('ZIP_CODE');
    });

    it('should fall back to the shared table', () => {
      expect(normalize('JP_PERSON', 'ner')).toBe('PERSON');
      expect(normalize('PHONE_NUMBER_JP', 'pattern')).toBe('PHONE');
    });

    it('should ignore label case when the exact spelling is missing', () => {
      expect(normalize('per', 'ner')).toBe('PERSON');
      expect(normalize('email_address', 'pattern')).toBe('EMAIL');
    });

    it('should accept canonical type names directly', () => {
      expect(normalize('CUSTOMER_ID', 'generative')).toBe('CUSTOMER_ID');
      expect(normalize('gender', 'unknown-vocabulary')).toBe('GENDER');
    });

    it('should be total: unknown labels become UNKNOWN', () => {
      expect(normalize('MISC', 'ner')).toBe('UNKNOWN');
      expect(normalize('O', 'ner')).toBe('UNKNOWN');
      expect(normalize('', 'ner')).toBe('UNKNOWN');
      expect(normalize('<hobby>', 'generative')).toBe('UNKNOWN');
    });

    it('should not leak one vocabulary into another', () => {
      expect(normalize('人名', 'ner')).toBe('UNKNOWN');
    });

    it('should use custom tables', () => {
      const vocabularies = VocabulariesSchema.parse({ custom: { NAME: 'PERSON' } });
      expect(normalize('B-NAME', 'custom', vocabularies)).toBe('PERSON');
      expect(normalize('B-NAME', 'ner', vocabularies)).toBe('UNKNOWN');
    });
  });

  describe('VocabulariesSchema', () => {
    it('should reject targets outside the canonical taxonomy', () => {
      const result = VocabulariesSchema.safeParse({ ner: { PER: 'HUMAN' } });
      expect(result.success).toBe(false);
    });
  });

  describe('TypeNormalizer', () => {
    function createNormalizer(): { normalizer: TypeNormalizer; sink: CollectingSink } {
      const sink = new CollectingSink();
      const normalizer = new TypeNormalizer(
        VocabulariesSchema.parse({ ner: { PER: 'PERSON' } }),
        { NER: 'ner' },
        new EventRecorder(sink)
      );
      return { normalizer, sink };
    }

    it('should resolve through the source vocabulary', () => {
      const { normalizer, sink } = createNormalizer();
      expect(normalizer.resolve('B-PER', 'NER')).toBe('PERSON');
      expect(sink.events).toHaveLength(0);
    });

    it('should use the shared vocabulary for unconfigured sources', () => {
      const { normalizer } = createNormalizer();
      expect(normalizer.vocabularyFor('PATTERN')).toBe('shared');
    });

    it('should record unmapped labels', () => {
      const { normalizer, sink } = createNormalizer();
      expect(normalizer.resolve('MISC', 'NER')).toBe('UNKNOWN');
      expect(sink.events).toEqual([
        {
          category: 'MAPPING_UNKNOWN',
          reason: 'UNMAPPED_LABEL',
          source: 'NER',
          rawType: 'MISC',
          detail: 'no mapping in vocabulary "ner"',
        },
      ]);
    });

    it('should not report an explicit UNKNOWN label', () => {
      const { normalizer, sink } = createNormalizer();
      expect(normalizer.resolve('UNKNOWN', 'NER')).toBe('UNKNOWN');
      expect(sink.events).toHaveLength(0);
    });
  });
});
