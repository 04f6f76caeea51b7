/**
 * @module pipeline/config.test
 * @description Unit tests for pipeline presets, merging and validation
 * @status COMPLETE
 * @dependencies src/pipeline/config.ts
 * @lastModified 2026-10-17
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  PIPELINE_PRESETS,
  PipelineConfigInputSchema,
  getPreset,
  mappingTableErrors,
  mergeConfig,
  validateConfig,
} from './config';

describe('pipeline/config', () => {
  describe('presets', () => {
    it('should all be valid', () => {
      for (const preset of PIPELINE_PRESETS) {
        expect(validateConfig(getPreset(preset))).toEqual({ valid: true, errors: [] });
      }
    });

    it('should only enable strict mode in STRICT', () => {
      expect(getPreset('STRICT').strict).toBe(true);
      expect(getPreset('BALANCED').strict).toBe(false);
      expect(getPreset('PERMISSIVE').strict).toBe(false);
    });

    it('should return copies', () => {
      const preset = getPreset('BALANCED');
      preset.strict = true;
      expect(getPreset('BALANCED').strict).toBe(false);
    });
  });

  describe('mergeConfig', () => {
    it('should merge nested sections field by field', () => {
      const config = mergeConfig({ strict: true, consensus: { threshold: 0.7 } });

      expect(config.strict).toBe(true);
      expect(config.consensus.threshold).toBe(0.7);
      expect(config.consensus.primarySources).toEqual(['PATTERN', 'NER']);
    });

    it('should start from the named preset', () => {
      const config = mergeConfig({ preset: 'PERMISSIVE' });
      expect(config.noise.minContentRatio).toBe(0.3);
      expect(config.minScores).toEqual({});
    });

    it('should prefer an explicit base over the preset field', () => {
      const config = mergeConfig({ preset: 'STRICT' }, DEFAULT_CONFIG);
      expect(config.strict).toBe(false);
    });

    it('should merge vocabulary tables entry by entry', () => {
      const config = mergeConfig({ vocabularies: { ner: { NORP: 'ORGANIZATION' }, custom: { ID: 'CUSTOMER_ID' } } });

      expect(config.vocabularies['ner']?.['NORP']).toBe('ORGANIZATION');
      expect(config.vocabularies['ner']?.['PER']).toBe('PERSON');
      expect(config.vocabularies['custom']).toEqual({ ID: 'CUSTOMER_ID' });
    });

    it('should merge per-type span limits', () => {
      const config = mergeConfig({ recovery: { maxSpanByType: { PERSON: 60 }, searchWindow: 300 } });

      expect(config.recovery.maxSpanByType.PERSON).toBe(60);
      expect(config.recovery.maxSpanByType.LOCATION).toBe(200);
      expect(config.recovery.searchWindow).toBe(300);
      expect(config.recovery.lengthTolerance).toBe(0.3);
    });

    it('should replace the priority order as a whole', () => {
      expect(mergeConfig({ priority: ['PERSON', 'EMAIL'] }).priority).toEqual(['PERSON', 'EMAIL']);
    });
  });

  describe('validateConfig', () => {
    it('should reject an out-of-range threshold', () => {
      const config = mergeConfig({}, { ...DEFAULT_CONFIG, consensus: { ...DEFAULT_CONFIG.consensus, threshold: 0 } });
      expect(validateConfig(config).errors).toEqual(['Agreement threshold must be in (0, 1]: 0']);
    });

    it('should reject a source on both consensus sides in strict mode', () => {
      const config = mergeConfig({
        strict: true,
        consensus: { primarySources: ['PATTERN', 'NER'], secondarySources: ['NER'] },
      });
      expect(validateConfig(config).errors).toEqual(['Sources on both consensus sides: NER']);
    });

    it('should reject an empty consensus side in strict mode', () => {
      const config = mergeConfig({ strict: true, consensus: { secondarySources: [] } });
      expect(validateConfig(config).valid).toBe(false);
    });

    it('should reject duplicate priority entries', () => {
      const config = mergeConfig({ priority: ['PERSON', 'PERSON'] });
      expect(validateConfig(config).errors).toEqual(['Priority order lists a type more than once']);
    });

    it('should reject out-of-range scores and ratios', () => {
      const config = {
        ...DEFAULT_CONFIG,
        minScores: { NER: 1.5 },
        noise: { minContentRatio: -0.1, allowList: [] },
      };
      expect(validateConfig(config).errors).toEqual([
        'Noise content ratio must be in [0, 1]: -0.1',
        'Minimum score for NER must be in [0, 1]: 1.5',
      ]);
    });
  });

  describe('mappingTableErrors', () => {
    it('should report undefined and empty vocabularies', () => {
      const config = {
        ...DEFAULT_CONFIG,
        vocabularies: { ...DEFAULT_CONFIG.vocabularies, transformer: {} },
        sourceVocabulary: { ...DEFAULT_CONFIG.sourceVocabulary, NER: 'ginza' },
      };
      expect(mappingTableErrors(config)).toEqual([
        'Vocabulary "ginza" is not defined',
        'Vocabulary "transformer" is empty',
      ]);
    });

    it('should report a config without tables', () => {
      expect(mappingTableErrors({ ...DEFAULT_CONFIG, vocabularies: {} })).toEqual(['No vocabulary tables configured']);
    });
  });

  describe('PipelineConfigInputSchema', () => {
    it('should accept a partial config', () => {
      const parsed = PipelineConfigInputSchema.safeParse({ preset: 'STRICT', noise: { allowList: ['Acme'] } });
      expect(parsed.success).toBe(true);
    });

    it('should reject unknown keys and bad values', () => {
      expect(PipelineConfigInputSchema.safeParse({ stirct: true }).success).toBe(false);
      expect(PipelineConfigInputSchema.safeParse({ consensus: { threshold: 1.5 } }).success).toBe(false);
      expect(PipelineConfigInputSchema.safeParse({ priority: ['HUMAN'] }).success).toBe(false);
    });
  });
});
