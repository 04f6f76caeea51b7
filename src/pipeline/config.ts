/**
 * @module pipeline/config
 * @description Immutable pipeline configuration, presets and validation
 * @status COMPLETE
 * @dependencies zod, src/normalizer, src/recovery, src/consensus, src/merge, src/noise
 * @lastModified 2026-10-18
 */

import { z } from 'zod';
import { CANONICAL_TYPES, DETECTOR_SOURCES, type CanonicalType, type DetectorSource } from '../types/entities';
import {
  DEFAULT_VOCABULARIES,
  SHARED_VOCABULARY,
  VocabulariesSchema,
  type Vocabularies,
} from '../normalizer/type-normalizer';
import { DEFAULT_RECOVERY_OPTIONS, type RecoveryOptions } from '../recovery/span-recovery';
import { DEFAULT_CONSENSUS_OPTIONS, type ConsensusOptions } from '../consensus/consensus-engine';
import { DEFAULT_PRIORITY } from '../merge/merger';
import { NOISE_DEFAULTS } from '../constants';

// ============================================================================
// Configuration Types
// ============================================================================

export interface NoiseConfig {
  /** Minimum share of content characters in a candidate's text */
  minContentRatio: number;
  /** Terms that are never reported */
  allowList: readonly string[];
}

/**
 * Everything a pipeline instance needs. Fixed at construction.
 */
export interface PipelineConfig {
  /** Require cross-detector consensus */
  strict: boolean;
  /** Label tables by vocabulary name */
  vocabularies: Vocabularies;
  /** Vocabulary each detector source's labels are read through */
  sourceVocabulary: Readonly<Partial<Record<DetectorSource, string>>>;
  consensus: ConsensusOptions;
  /** Containment priority, highest first */
  priority: readonly CanonicalType[];
  noise: NoiseConfig;
  /** Candidates scoring below their source's minimum are dropped on entry */
  minScores: Readonly<Partial<Record<DetectorSource, number>>>;
  recovery: RecoveryOptions;
}

/**
 * Named preset configurations
 */
export type PipelinePreset = 'STRICT' | 'BALANCED' | 'PERMISSIVE';

export const PIPELINE_PRESETS = ['STRICT', 'BALANCED', 'PERMISSIVE'] as const satisfies readonly PipelinePreset[];

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_SOURCE_VOCABULARY: Readonly<Record<DetectorSource, string>> = {
  PATTERN: 'pattern',
  NER: 'ner',
  TRANSFORMER: 'transformer',
  GENERATIVE: 'generative',
  CONSENSUS: SHARED_VOCABULARY,
};

/**
 * BALANCED: every detector's findings pass, weak statistical hits are cut
 */
export const DEFAULT_CONFIG: PipelineConfig = {
  strict: false,
  vocabularies: DEFAULT_VOCABULARIES,
  sourceVocabulary: DEFAULT_SOURCE_VOCABULARY,
  consensus: DEFAULT_CONSENSUS_OPTIONS,
  priority: DEFAULT_PRIORITY,
  noise: {
    minContentRatio: NOISE_DEFAULTS.MIN_CONTENT_RATIO,
    allowList: [],
  },
  minScores: { PATTERN: 0.5, NER: 0.5 },
  recovery: DEFAULT_RECOVERY_OPTIONS,
};

/**
 * STRICT preset: dual detection, only entities two sides agree on
 */
export const STRICT_CONFIG: PipelineConfig = {
  ...DEFAULT_CONFIG,
  strict: true,
};

/**
 * PERMISSIVE preset: no score floor, looser noise filter
 */
export const PERMISSIVE_CONFIG: PipelineConfig = {
  ...DEFAULT_CONFIG,
  noise: { ...DEFAULT_CONFIG.noise, minContentRatio: 0.3 },
  minScores: {},
};

export const PRESETS: Record<PipelinePreset, PipelineConfig> = {
  STRICT: STRICT_CONFIG,
  BALANCED: DEFAULT_CONFIG,
  PERMISSIVE: PERMISSIVE_CONFIG,
};

/**
 * Get an independent copy of a preset's configuration
 */
export function getPreset(preset: PipelinePreset): PipelineConfig {
  return structuredClone(PRESETS[preset]);
}

/**
 * Freeze an object and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return value;
}

// ============================================================================
// Config File Schema
// ============================================================================

const CanonicalTypeSchema = z.enum(CANONICAL_TYPES);
const SourceSchema = z.enum(DETECTOR_SOURCES);
const ScoreSchema = z.number().min(0).max(1);

/**
 * Shape of a JSON config file. Every field is optional and overrides the
 * preset it names (BALANCED by default).
 */
export const PipelineConfigInputSchema = z
  .object({
    preset: z.enum(PIPELINE_PRESETS).optional(),
    strict: z.boolean().optional(),
    vocabularies: VocabulariesSchema.optional(),
    sourceVocabulary: z.record(SourceSchema, z.string().min(1)).optional(),
    consensus: z
      .object({
        threshold: z.number().gt(0).max(1),
        primarySources: z.array(SourceSchema),
        secondarySources: z.array(SourceSchema),
        exemptTypes: z.array(CanonicalTypeSchema),
      })
      .strict()
      .partial()
      .optional(),
    priority: z.array(CanonicalTypeSchema).optional(),
    noise: z
      .object({
        minContentRatio: ScoreSchema,
        allowList: z.array(z.string()),
      })
      .strict()
      .partial()
      .optional(),
    minScores: z.record(SourceSchema, ScoreSchema).optional(),
    recovery: z
      .object({
        lengthTolerance: z.number().min(0).lt(1),
        searchWindow: z.number().int().positive(),
        baseScore: ScoreSchema,
        anchorChars: z.number().int().positive(),
        maxSpanByType: z.record(CanonicalTypeSchema, z.number().int().positive()),
        maxSpanDefault: z.number().int().positive(),
      })
      .strict()
      .partial()
      .optional(),
  })
  .strict();

export type PipelineConfigInput = z.infer<typeof PipelineConfigInputSchema>;

// ============================================================================
// Configuration Helpers
// ============================================================================

function mergeVocabularies(base: Vocabularies, user: Vocabularies | undefined): Vocabularies {
  if (!user) return base;
  const merged: Record<string, Vocabularies[string]> = { ...base };
  for (const [name, table] of Object.entries(user)) {
    merged[name] = { ...(base[name] ?? {}), ...table };
  }
  return merged;
}

/**
 * Merge user overrides onto a base configuration. Nested sections merge
 * field by field; vocabulary tables merge entry by entry.
 */
export function mergeConfig(
  userConfig: PipelineConfigInput,
  base?: PipelineConfig
): PipelineConfig {
  const start = base ?? getPreset(userConfig.preset ?? 'BALANCED');

  return {
    strict: userConfig.strict ?? start.strict,
    vocabularies: mergeVocabularies(start.vocabularies, userConfig.vocabularies),
    sourceVocabulary: { ...start.sourceVocabulary, ...userConfig.sourceVocabulary },
    consensus: { ...start.consensus, ...userConfig.consensus },
    priority: userConfig.priority ?? start.priority,
    noise: { ...start.noise, ...userConfig.noise },
    minScores: { ...start.minScores, ...userConfig.minScores },
    recovery: {
      ...start.recovery,
      ...userConfig.recovery,
      fuzzyThresholds: start.recovery.fuzzyThresholds,
      maxSpanByType: { ...start.recovery.maxSpanByType, ...userConfig.recovery?.maxSpanByType },
    },
  };
}

/**
 * Problems with the label tables: referenced tables missing or empty
 */
export function mappingTableErrors(config: PipelineConfig): string[] {
  const errors: string[] = [];

  if (Object.keys(config.vocabularies).length === 0) {
    errors.push('No vocabulary tables configured');
    return errors;
  }

  const referenced = new Set(Object.values(config.sourceVocabulary));
  for (const name of referenced) {
    if (name === undefined) continue;
    const table = config.vocabularies[name];
    if (table === undefined) {
      if (name !== SHARED_VOCABULARY) errors.push(`Vocabulary "${name}" is not defined`);
      continue;
    }
    if (Object.keys(table).length === 0) {
      errors.push(`Vocabulary "${name}" is empty`);
    }
  }

  return errors;
}

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Validate a configuration
 */
export function validateConfig(config: PipelineConfig): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [...mappingTableErrors(config)];
  const { consensus, recovery } = config;

  if (!(consensus.threshold > 0 && consensus.threshold <= 1)) {
    errors.push(`Agreement threshold must be in (0, 1]: ${consensus.threshold}`);
  }
  if (config.strict) {
    if (consensus.primarySources.length === 0 || consensus.secondarySources.length === 0) {
      errors.push('Strict mode needs sources on both consensus sides');
    }
    const overlap = consensus.primarySources.filter((s) => consensus.secondarySources.includes(s));
    if (overlap.length > 0) {
      errors.push(`Sources on both consensus sides: ${overlap.join(', ')}`);
    }
  }

  if (new Set(config.priority).size !== config.priority.length) {
    errors.push('Priority order lists a type more than once');
  }

  if (!inUnitRange(config.noise.minContentRatio)) {
    errors.push(`Noise content ratio must be in [0, 1]: ${config.noise.minContentRatio}`);
  }

  for (const [source, score] of Object.entries(config.minScores)) {
    if (score !== undefined && !inUnitRange(score)) {
      errors.push(`Minimum score for ${source} must be in [0, 1]: ${score}`);
    }
  }

  if (!(recovery.lengthTolerance >= 0 && recovery.lengthTolerance < 1)) {
    errors.push(`Length tolerance must be in [0, 1): ${recovery.lengthTolerance}`);
  }
  if (!Number.isInteger(recovery.searchWindow) || recovery.searchWindow <= 0) {
    errors.push(`Search window must be a positive integer: ${recovery.searchWindow}`);
  }
  if (!Number.isInteger(recovery.anchorChars) || recovery.anchorChars <= 0) {
    errors.push(`Anchor length must be a positive integer: ${recovery.anchorChars}`);
  }
  if (!inUnitRange(recovery.baseScore)) {
    errors.push(`Generative base score must be in [0, 1]: ${recovery.baseScore}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
