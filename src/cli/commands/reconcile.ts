/**
 * @module cli/commands/reconcile
 * @description Reconcile command - reconcile detector output from a JSON file
 * @status COMPLETE
 * @dependencies commander, src/pipeline, src/masking
 * @lastModified 2026-10-18
 */

import { Command, Option } from 'commander';
import { ConfigurationError } from '../../types/common';
import { loadDetectorOutputs, readTextFile } from '../../pipeline/inputs';
import { Reconciler } from '../../pipeline/reconciler';
import { maskText, MASK_MODES, type MaskMode } from '../../masking/masker';
import { createConsoleSink } from '../../observability/sinks';
import { fail, resolvePipelineConfig, writeOutput } from '../shared';
import { renderReport, REPORT_FORMATS, type ReportFormat } from '../../output/report';

// ============================================================================
// Types
// ============================================================================

interface ReconcileOptions {
  detections: string;
  strict: boolean;
  config?: string;
  format: ReportFormat;
  mask?: MaskMode;
  output?: string;
  verbose: boolean;
}

// ============================================================================
// Command Definition
// ============================================================================

export const reconcileCommand = new Command('reconcile')
  .description('Reconcile detector output for a text file into one candidate list')
  .argument('<text-file>', 'Path to the source text')
  .requiredOption('-d, --detections <file>', 'JSON file with { detections, tagged }')
  .option('-s, --strict', 'Require cross-detector consensus', false)
  .option('-c, --config <file>', 'JSON pipeline config')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('json'))
  .addOption(new Option('-m, --mask <mode>', 'Also print masked text').choices(MASK_MODES))
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .option('-v, --verbose', 'Log every pipeline event to stderr', false)
  .action(async (file: string, options: ReconcileOptions) => {
    await runReconcile(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

async function runReconcile(file: string, options: ReconcileOptions): Promise<void> {
  const text = readTextFile(file);
  if (!text.success) fail(text.error.message);

  const outputs = loadDetectorOutputs(options.detections);
  if (!outputs.success) fail(outputs.error.message);

  const config = resolvePipelineConfig({ config: options.config, strict: options.strict });
  if (!config.success) fail(config.error.message);

  let reconciler: Reconciler;
  try {
    reconciler = new Reconciler(config.data, options.verbose ? { sink: createConsoleSink({ verbose: true }) } : {});
  } catch (error) {
    if (error instanceof ConfigurationError) fail(error.message);
    throw error;
  }

  const result = reconciler.reconcile(text.data, outputs.data);
  const mask = options.mask ? maskText(text.data, result.candidates, { mode: options.mask }) : undefined;

  writeOutput(renderReport({ text: text.data, result, ...(mask ? { mask } : {}) }, options.format, options.verbose), options.output);
}
