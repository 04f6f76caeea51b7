/**
 * @module constants
 * @description Central constants file for all threshold values and magic numbers
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-15
 */

// ============================================================================
// Consensus
// ============================================================================

/**
 * Agreement settings for strict (dual-detection) mode
 */
export const CONSENSUS_DEFAULTS = {
  /** Overlap must cover this share of the shorter span */
  AGREEMENT_THRESHOLD: 0.5,
} as const;

// ============================================================================
// Span Recovery
// ============================================================================

/**
 * Generative span recovery settings
 */
export const RECOVERY_DEFAULTS = {
  /** Allowed relative length deviation of a fuzzy match (±30%) */
  LENGTH_TOLERANCE: 0.3,
  /** Characters scanned past a single anchor */
  SEARCH_WINDOW: 700,
  /** Score given to a generative candidate before match quality is applied */
  BASE_SCORE: 0.85,
  /** Longest span accepted for a type without its own limit */
  MAX_SPAN_DEFAULT: 120,
  /** Characters of generation context used as an anchor */
  ANCHOR_CHARS: 16,
  /** Match quality of a whitespace/punctuation-insensitive hit */
  NORMALIZED_QUALITY: 0.95,
} as const;

/**
 * Longest accepted recovered span per canonical type
 */
export const MAX_SPAN_BY_TYPE = {
  PERSON: 40,
  LOCATION: 200,
  ORGANIZATION: 80,
  CUSTOMER_ID: 40,
  EMAIL: 80,
  PHONE: 40,
  ZIP_CODE: 20,
  DATE_OF_BIRTH: 30,
} as const;

/**
 * Minimum similarity for a fuzzy match, by tagged value length.
 * Short values need a near-exact match to be trusted.
 */
export const FUZZY_THRESHOLDS = {
  /** Values up to this length use SHORT */
  SHORT_MAX_LENGTH: 9,
  /** Values up to this length use MID */
  MID_MAX_LENGTH: 20,
  SHORT: 0.93,
  MID: 0.86,
  LONG: 0.8,
} as const;

// ============================================================================
// Noise Filter
// ============================================================================

export const NOISE_DEFAULTS = {
  /** Minimum share of content (non-space, non-punctuation) characters */
  MIN_CONTENT_RATIO: 0.5,
} as const;

// ============================================================================
// Pattern Detector
// ============================================================================

/**
 * Context word handling for regex recognizers
 */
export const PATTERN_CONTEXT = {
  /** Characters before a match searched for context words */
  WINDOW_CHARS: 30,
  /** Score added when a context word is present */
  SCORE_BOOST: 0.35,
} as const;

// ============================================================================
// Detectors
// ============================================================================

export const DETECTOR_DEFAULTS = {
  /** Per-detector timeout when fanning out */
  TIMEOUT_MS: 30_000,
  /** Token classifier minimum mean token score */
  MIN_TOKEN_CONFIDENCE: 0.8,
} as const;

// ============================================================================
// Display/Formatting
// ============================================================================

/**
 * Text display limits
 */
export const DISPLAY_LIMITS = {
  /** Maximum characters for truncated preview */
  PREVIEW_MAX_CHARS: 50,
  /** Characters of source text shown around a discarded tag */
  DISCARD_CONTEXT_CHARS: 40,
} as const;

/**
 * MCP Server limits
 */
export const MCP_LIMITS = {
  /** Maximum text size to accept (10MB) */
  MAX_CONTENT_SIZE: 10 * 1024 * 1024,
} as const;

// ============================================================================
// Masking
// ============================================================================

/**
 * Replacement strings for `fixed` masking
 */
export const FIXED_MASKS = {
  DEFAULT: '****',
  PHONE: '***-****-****',
  ZIP_CODE: '***-****',
} as const;
