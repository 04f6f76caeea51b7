/**
 * @module types/common
 * @description Shared utility types used across all modules
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-12
 */

// ============================================================================
// Result Type (Error Handling Without Throwing)
// ============================================================================

/**
 * Represents the outcome of an operation that can fail
 * @template T - The success data type
 * @template E - The error type (defaults to Error)
 *
 * @example
 * const result = loadDetectorOutputs(raw);
 * if (result.success) {
 *   reconciler.reconcile(text, result.data);
 * } else {
 *   console.error(result.error.message);
 * }
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful Result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed Result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Standardized error structure for all modules
 */
export interface AppError {
  /** Machine-readable error code */
  code: string;
  /** Human-readable message */
  message: string;
  /** Additional context */
  context?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

/**
 * Errors raised while reading config or detector-output files
 */
export type InputErrorCode =
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_ERROR'
  | 'INVALID_JSON'
  | 'SCHEMA_VIOLATION';

export interface InputError extends AppError {
  code: InputErrorCode;
  /** Path of the offending file, when there is one */
  filePath?: string;
  /** Flattened validation issues (`path: message`) */
  issues?: string[];
}

/**
 * Codes for the only fatal conditions the pipeline has.
 * All of them are raised while building a pipeline, never per detection.
 */
export type ConfigurationErrorCode =
  | 'INVALID_CONFIG'
  | 'EMPTY_MAPPING_TABLE'
  | 'MISSING_TEXT';

/**
 * Thrown for construction-time misconfiguration
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly issues: string[];

  constructor(code: ConfigurationErrorCode, message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
    this.issues = issues;
  }
}

/**
 * Build an Error from an unknown thrown value
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ============================================================================
// Span Primitives
// ============================================================================

/**
 * Half-open character range `[start, end)` in UTF-16 code units
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Length of the overlap between two spans (0 when disjoint)
 */
export function overlapLength(a: Span, b: Span): number {
  return Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
}

/**
 * Span length
 */
export function spanLength(span: Span): number {
  return span.end - span.start;
}

/**
 * True when `outer` covers every position of `inner`
 */
export function containsSpan(outer: Span, inner: Span): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * Clamp a score into [0, 1]
 */
export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(1, score));
}
