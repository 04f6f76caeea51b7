/**
 * @module observability/sinks
 * @description Observability sinks and the recorder that shields the pipeline from them
 * @status COMPLETE
 * @dependencies src/types/events.ts
 * @lastModified 2026-10-18
 */

import type { ObservabilitySink, ReconcileEvent } from '../types/events';
import { DISPLAY_LIMITS } from '../constants';

// ============================================================================
// Formatting
// ============================================================================

/**
 * Shorten a value for log output
 */
export function preview(value: string, maxChars: number = DISPLAY_LIMITS.PREVIEW_MAX_CHARS): string {
  const flat = value.replace(/\s+/g, ' ');
  return flat.length > maxChars ? `${flat.slice(0, maxChars)}...` : flat;
}

/**
 * One-line description of an event
 *
 * @example
 * formatEvent({ category: 'NOISE_REJECT', reason: 'NOISE_CONTENT', source: 'NER', span: { start: 4, end: 7 } });
 * // 'NOISE_REJECT/NOISE_CONTENT [NER] span=[4,7)'
 */
export function formatEvent(event: ReconcileEvent): string {
  const parts = [`${event.category}/${event.reason}`, `[${event.source}]`];
  if (event.rawType !== undefined) parts.push(`type=${event.rawType}`);
  if (event.span) parts.push(`span=[${event.span.start},${event.span.end})`);
  if (event.value !== undefined) parts.push(`value="${preview(event.value)}"`);
  if (event.detail) parts.push(`(${event.detail})`);
  return parts.join(' ');
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Sink that drops everything
 */
export const NULL_SINK: ObservabilitySink = {
  record: () => undefined,
};

/**
 * Sink that keeps every event in memory
 */
export class CollectingSink implements ObservabilitySink {
  readonly events: ReconcileEvent[] = [];

  record(event: ReconcileEvent): void {
    this.events.push(event);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export interface ConsoleSinkOptions {
  /** Also print MAPPING_UNKNOWN and SCORE_REJECT events */
  verbose?: boolean;
  /** Prefix for every line */
  prefix?: string;
}

/**
 * Sink that writes events to stderr.
 * stdout stays clean for CLI output and the MCP stdio transport.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): ObservabilitySink {
  const prefix = options.prefix ?? '[pii-reconcile]';
  return {
    record(event: ReconcileEvent): void {
      const chatty = event.category === 'MAPPING_UNKNOWN' || event.category === 'SCORE_REJECT';
      if (chatty && !options.verbose) return;
      console.error(`${prefix} ${formatEvent(event)}`);
    },
  };
}

/**
 * Forward every event to several sinks. A sink that throws is reported and
 * the remaining sinks still receive the event.
 */
export function fanOutSink(...sinks: ObservabilitySink[]): ObservabilitySink {
  return {
    record(event: ReconcileEvent): void {
      for (const sink of sinks) {
        try {
          sink.record(event);
        } catch (error) {
          console.warn(`Observability sink failed on ${event.category}/${event.reason}:`, error);
        }
      }
    },
  };
}

// ============================================================================
// Recorder
// ============================================================================

/**
 * Per-request event log. Keeps its own copy of every event and forwards it to
 * the configured sink; a sink that throws is reported and otherwise ignored.
 */
export class EventRecorder {
  private readonly recorded: ReconcileEvent[] = [];

  constructor(private readonly sink: ObservabilitySink = NULL_SINK) {}

  record(event: ReconcileEvent): void {
    this.recorded.push(event);
    try {
      this.sink.record(event);
    } catch (error) {
      console.warn(`Observability sink failed on ${event.category}/${event.reason}:`, error);
    }
  }

  get events(): readonly ReconcileEvent[] {
    return this.recorded;
  }

  /**
   * Count of events per category
   */
  countByCategory(): Partial<Record<ReconcileEvent['category'], number>> {
    const counts: Partial<Record<ReconcileEvent['category'], number>> = {};
    for (const event of this.recorded) {
      counts[event.category] = (counts[event.category] ?? 0) + 1;
    }
    return counts;
  }
}
