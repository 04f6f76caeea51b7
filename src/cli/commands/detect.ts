/**
 * @module cli/commands/detect
 * @description Detect command - run the pattern detector through the pipeline
 * @status COMPLETE
 * @dependencies commander, src/detectors, src/pipeline, src/masking
 * @lastModified 2026-10-18
 */

import { Command, Option } from 'commander';
import { ConfigurationError } from '../../types/common';
import { readTextFile } from '../../pipeline/inputs';
import { Reconciler } from '../../pipeline/reconciler';
import { DetectionService } from '../../detectors/detection-service';
import { PatternDetector } from '../../detectors/pattern-detector';
import { maskText, MASK_MODES, type MaskMode } from '../../masking/masker';
import { createConsoleSink } from '../../observability/sinks';
import { fail, resolvePipelineConfig, writeOutput } from '../shared';
import { renderReport, REPORT_FORMATS, type ReportFormat } from '../../output/report';

// ============================================================================
// Types
// ============================================================================

interface DetectOptions {
  config?: string;
  allowList?: string;
  format: ReportFormat;
  mask?: MaskMode;
  output?: string;
  verbose: boolean;
}

// ============================================================================
// Command Definition
// ============================================================================

export const detectCommand = new Command('detect')
  .description('Find structured personal data (email, phone, postal code, dates, ...) with regex patterns')
  .argument('<text-file>', 'Path to the source text')
  .option('-c, --config <file>', 'JSON pipeline config')
  .option('-a, --allow-list <file>', 'Dictionary of terms never to report')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('json'))
  .addOption(new Option('-m, --mask <mode>', 'Also print masked text').choices(MASK_MODES))
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .option('-v, --verbose', 'Log every pipeline event to stderr', false)
  .action(async (file: string, options: DetectOptions) => {
    await runDetect(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

async function runDetect(file: string, options: DetectOptions): Promise<void> {
  const text = readTextFile(file);
  if (!text.success) fail(text.error.message);

  const config = resolvePipelineConfig({ config: options.config, allowList: options.allowList });
  if (!config.success) fail(config.error.message);

  if (config.data.strict) {
    console.warn('Warning: strict mode needs a second detector; pattern-only detection will report nothing');
  }

  let reconciler: Reconciler;
  try {
    reconciler = new Reconciler(config.data, options.verbose ? { sink: createConsoleSink({ verbose: true }) } : {});
  } catch (error) {
    if (error instanceof ConfigurationError) fail(error.message);
    throw error;
  }

  const service = new DetectionService([new PatternDetector()], reconciler);
  await service.start();
  const result = await service.analyze(text.data);
  await service.stop();

  const mask = options.mask ? maskText(text.data, result.candidates, { mode: options.mask }) : undefined;

  writeOutput(renderReport({ text: text.data, result, ...(mask ? { mask } : {}) }, options.format, options.verbose), options.output);
}
