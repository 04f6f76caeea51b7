/**
 * @module pipeline/index
 * @description Reconciliation pipeline, its configuration and input loaders
 * @status COMPLETE
 * @lastModified 2026-10-17
 */

// ============================================================================
// Config Exports
// ============================================================================

export {
  type NoiseConfig,
  type PipelineConfig,
  type PipelinePreset,
  type PipelineConfigInput,
  PIPELINE_PRESETS,
  DEFAULT_SOURCE_VOCABULARY,
  DEFAULT_CONFIG,
  STRICT_CONFIG,
  PERMISSIVE_CONFIG,
  PRESETS,
  PipelineConfigInputSchema,
  getPreset,
  mergeConfig,
  mappingTableErrors,
  validateConfig,
} from './config';

// ============================================================================
// Input Exports
// ============================================================================

export {
  RawDetectionSchema,
  TaggedValueSchema,
  DetectorOutputsSchema,
  EntityCandidateSchema,
  EntityCandidateListSchema,
  CandidateFileSchema,
  formatIssues,
  validateInput,
  readTextFile,
  readJsonFile,
  loadDetectorOutputs,
  loadCandidates,
  loadConfigFile,
} from './inputs';

// ============================================================================
// Reconciler Exports
// ============================================================================

export {
  type ReconcileStats,
  type ReconcileResult,
  type ReconcilerOptions,
  type ReconcileCallOptions,
  Reconciler,
} from './reconciler';
