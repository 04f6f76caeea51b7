/**
 * @module cli/shared
 * @description Config resolution and output helpers shared by CLI commands
 * @status COMPLETE
 * @dependencies src/pipeline, src/noise
 * @lastModified 2026-10-18
 */

import * as fs from 'fs';
import * as path from 'path';
import { ok, type InputError, type Result } from '../types/common';
import { DEFAULT_CONFIG, mergeConfig, type PipelineConfig } from '../pipeline/config';
import { loadConfigFile, readTextFile } from '../pipeline/inputs';
import { parseDictionary } from '../noise/allow-list';

// ============================================================================
// Types
// ============================================================================

export interface ConfigFlags {
  /** Path to a JSON config file */
  config?: string;
  strict?: boolean;
  /** Path to an allow-list dictionary */
  allowList?: string;
}

// ============================================================================
// Config
// ============================================================================

/**
 * Build the pipeline config from CLI flags: config file (or BALANCED), then
 * `--strict`, then allow-list terms appended to the configured ones.
 */
export function resolvePipelineConfig(flags: ConfigFlags): Result<PipelineConfig, InputError> {
  let config = DEFAULT_CONFIG;

  if (flags.config) {
    const loaded = loadConfigFile(flags.config);
    if (!loaded.success) return loaded;
    config = loaded.data;
  }

  if (flags.strict) {
    config = mergeConfig({ strict: true }, config);
  }

  if (flags.allowList) {
    const dictionary = readTextFile(flags.allowList);
    if (!dictionary.success) return dictionary;
    const terms = parseDictionary(dictionary.data);
    config = mergeConfig({ noise: { allowList: [...config.noise.allowList, ...terms] } }, config);
  }

  return ok(config);
}

// ============================================================================
// Output
// ============================================================================

/**
 * Print an error and exit with status 1
 */
export function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/**
 * Write to a file when given, stdout otherwise
 */
export function writeOutput(output: string, file?: string): void {
  if (file) {
    const outputPath = path.resolve(file);
    fs.writeFileSync(outputPath, output, 'utf-8');
    console.log(`Output written to: ${outputPath}`);
  } else {
    console.log(output);
  }
}
