/**
 * @module cli/commands/mask
 * @description Mask command - apply a saved candidate list to a text file
 * @status COMPLETE
 * @dependencies commander, src/pipeline/inputs.ts, src/masking
 * @lastModified 2026-10-18
 */

import { Command, Option } from 'commander';
import { loadCandidates, readTextFile } from '../../pipeline/inputs';
import { maskText, MASK_MODES, type MaskMode } from '../../masking/masker';
import { fail, writeOutput } from '../shared';

interface MaskCommandOptions {
  candidates: string;
  mode: MaskMode;
  output?: string;
}

export const maskCommand = new Command('mask')
  .description('Mask a text file with candidates from a previous reconcile run')
  .argument('<text-file>', 'Path to the source text')
  .requiredOption('--candidates <file>', 'JSON array of candidates')
  .addOption(new Option('-m, --mode <mode>', 'Mask style').choices(MASK_MODES).default('tag'))
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .action(async (file: string, options: MaskCommandOptions) => {
    await runMask(file, options);
  });

async function runMask(file: string, options: MaskCommandOptions): Promise<void> {
  const text = readTextFile(file);
  if (!text.success) fail(text.error.message);

  const candidates = loadCandidates(options.candidates);
  if (!candidates.success) fail(candidates.error.message);

  const result = maskText(text.data, candidates.data, { mode: options.mode });
  if (result.skipped.length > 0) {
    console.warn(`Warning: ${result.skipped.length} candidate(s) inside other masked spans not masked`);
  }

  writeOutput(result.masked, options.output);
}
