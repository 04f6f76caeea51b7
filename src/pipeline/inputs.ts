/**
 * @module pipeline/inputs
 * @description zod schemas and loaders for detector-output, candidate and config files
 * @status COMPLETE
 * @dependencies zod, fs, src/pipeline/config.ts
 * @lastModified 2026-10-17
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CANONICAL_TYPES, DETECTOR_SOURCES, OFFSET_SOURCES, type DetectorOutputs, type EntityCandidate } from '../types/entities';
import { err, ok, toError, type InputError, type Result } from '../types/common';
import { mergeConfig, PipelineConfigInputSchema, type PipelineConfig } from './config';

// ============================================================================
// Schemas
// ============================================================================

const OffsetSourceSchema = z.enum(OFFSET_SOURCES);

/**
 * One raw detection. Offsets are only checked to be numbers here; bounds are
 * the pipeline's job, where a bad span becomes a discard event.
 */
export const RawDetectionSchema = z.object({
  start: z.number(),
  end: z.number(),
  rawType: z.string(),
  score: z.number(),
  source: OffsetSourceSchema,
});

export const TaggedValueSchema = z.object({
  value: z.string(),
  tag: z.string(),
  leftContext: z.string().optional(),
  rightContext: z.string().optional(),
});

export const DetectorOutputsSchema = z.object({
  detections: z.array(RawDetectionSchema).default([]),
  tagged: z.array(TaggedValueSchema).optional(),
});

export const EntityCandidateSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  canonicalType: z.enum(CANONICAL_TYPES),
  rawType: z.string(),
  score: z.number().min(0).max(1),
  source: z.enum(DETECTOR_SOURCES),
});

export const EntityCandidateListSchema = z.array(EntityCandidateSchema);

/** A bare candidate array, or a JSON report carrying one */
export const CandidateFileSchema = z.union([
  EntityCandidateListSchema,
  z.object({ candidates: EntityCandidateListSchema }).transform((report) => report.candidates),
]);

// ============================================================================
// Validation
// ============================================================================

/**
 * Flatten zod issues to `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate an already-parsed value against a schema
 */
export function validateInput<T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  filePath?: string
): Result<T, InputError> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return ok(parsed.data);

  const issues = formatIssues(parsed.error);
  return err({
    code: 'SCHEMA_VIOLATION',
    message: `Invalid input${filePath ? ` in ${filePath}` : ''}: ${issues[0] ?? 'unknown issue'}`,
    issues,
    ...(filePath ? { filePath } : {}),
  });
}

// ============================================================================
// File Loading
// ============================================================================

/**
 * Read a UTF-8 text file
 */
export function readTextFile(file: string): Result<string, InputError> {
  const filePath = path.resolve(file);
  if (!fs.existsSync(filePath)) {
    return err({ code: 'FILE_NOT_FOUND', message: `File not found: ${filePath}`, filePath });
  }

  try {
    return ok(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const cause = toError(error);
    return err({ code: 'FILE_READ_ERROR', message: `Error reading file: ${cause.message}`, filePath, cause });
  }
}

/**
 * Read a JSON file and validate it
 */
export function readJsonFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, InputError> {
  const content = readTextFile(file);
  if (!content.success) return content;

  const filePath = path.resolve(file);
  let value: unknown;
  try {
    value = JSON.parse(content.data);
  } catch (error) {
    const cause = toError(error);
    return err({ code: 'INVALID_JSON', message: `Invalid JSON in ${filePath}: ${cause.message}`, filePath, cause });
  }

  return validateInput(value, schema, filePath);
}

/**
 * Load detector outputs (`{ detections, tagged? }`) from a JSON file
 */
export function loadDetectorOutputs(file: string): Result<DetectorOutputs, InputError> {
  return readJsonFile(file, DetectorOutputsSchema);
}

/**
 * Load a candidate list from a JSON file: an array, or a JSON report
 */
export function loadCandidates(file: string): Result<EntityCandidate[], InputError> {
  return readJsonFile(file, CandidateFileSchema);
}

/**
 * Load a config file and merge it onto its preset
 */
export function loadConfigFile(file: string): Result<PipelineConfig, InputError> {
  const input = readJsonFile(file, PipelineConfigInputSchema);
  if (!input.success) return input;
  return ok(mergeConfig(input.data));
}
