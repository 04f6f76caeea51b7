#!/usr/bin/env node
/**
 * @module cli/index
 * @description CLI entry point for reconciling, detecting and masking personal data
 * @status COMPLETE
 * @dependencies commander, src/cli/commands
 * @lastModified 2026-10-18
 */

import { Command } from 'commander';
import { reconcileCommand, detectCommand, maskCommand } from './commands';

// ============================================================================
// Program Definition
// ============================================================================

const program = new Command();

program
  .name('pii-reconcile')
  .description('Reconcile personal-data detections from several detectors into one offset-exact span list')
  .version('0.4.0');

// ============================================================================
// Register Commands
// ============================================================================

program.addCommand(reconcileCommand);
program.addCommand(detectCommand);
program.addCommand(maskCommand);

// ============================================================================
// Default Action (no command)
// ============================================================================

program.action(() => {
  console.log(`
pii-reconcile - personal data detection reconciler

Usage: pii-reconcile <command> [options]

Commands:
  reconcile <text-file>   Reconcile detector output (--detections <json>)
  detect <text-file>      Run the pattern detector through the pipeline
  mask <text-file>        Mask a text with a saved candidate list

Examples:
  pii-reconcile reconcile letter.txt --detections letter.detections.json --strict
  pii-reconcile detect letter.txt --format text --mask numbered
  pii-reconcile mask letter.txt --candidates candidates.json --mode fixed

Options:
  -h, --help       Show help
  -V, --version    Show version

Run 'pii-reconcile <command> --help' for more information on a command.
`);
});

// ============================================================================
// Parse Arguments
// ============================================================================

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
