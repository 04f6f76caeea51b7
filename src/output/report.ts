/**
 * @module output/report
 * @description JSON and text reports of a reconciliation result
 * @status COMPLETE
 * @dependencies src/pipeline/reconciler.ts, src/masking/masker.ts, src/observability/sinks.ts
 * @lastModified 2026-10-18
 */

import { candidateText } from '../types/entities';
import type { ReconcileResult } from '../pipeline/reconciler';
import type { MaskResult } from '../masking/masker';
import { formatEvent, preview } from '../observability/sinks';

// ============================================================================
// Types
// ============================================================================

export type ReportFormat = 'json' | 'text';

export const REPORT_FORMATS = ['json', 'text'] as const satisfies readonly ReportFormat[];

export interface ReportInput {
  text: string;
  result: ReconcileResult;
  mask?: MaskResult;
}

// ============================================================================
// Reports
// ============================================================================

/**
 * JSON-ready report. Candidate text is sliced from the source for display.
 */
export function buildJsonReport(input: ReportInput) {
  const { text, result, mask } = input;
  return {
    candidates: result.candidates.map((candidate) => ({
      ...candidate,
      text: candidateText(text, candidate),
    })),
    stats: result.stats,
    events: result.events,
    ...(mask ? { masked: mask.masked, redactions: mask.redactions } : {}),
  };
}

function describeEventCounts(result: ReconcileResult): string {
  const counts = Object.entries(result.stats.events);
  if (counts.length === 0) return 'none';
  const breakdown = counts.map(([category, count]) => `${category}: ${count}`).join(', ');
  return `${result.events.length} (${breakdown})`;
}

/**
 * Human-readable report
 */
export function formatTextReport(input: ReportInput, verbose: boolean = false): string {
  const { text, result, mask } = input;
  const { stats } = result;

  const lines: string[] = [
    '=== PII Reconciliation Report ===',
    '',
    `Stages: accepted=${stats.accepted} -> consensus=${stats.afterConsensus} -> merged=${stats.afterMerge} -> final=${stats.final}`,
    '',
    `Candidates: ${result.candidates.length}`,
  ];

  result.candidates.forEach((candidate, i) => {
    const value = preview(candidateText(text, candidate));
    lines.push(
      `  ${i + 1}. ${candidate.canonicalType} [${candidate.start},${candidate.end}) "${value}" score=${candidate.score.toFixed(2)} source=${candidate.source}`
    );
  });

  lines.push('', `Events: ${describeEventCounts(result)}`);
  if (verbose) {
    for (const event of result.events) {
      lines.push(`  - ${formatEvent(event)}`);
    }
  }

  if (mask) {
    lines.push('', 'Masked text:', mask.masked);
  }

  return lines.join('\n');
}

export function renderReport(input: ReportInput, format: ReportFormat, verbose: boolean = false): string {
  return format === 'text' ? formatTextReport(input, verbose) : JSON.stringify(buildJsonReport(input), null, 2);
}
