/**
 * @module detectors/orchestrator
 * @description Concurrent detector fan-out with per-detector timeouts
 * @status COMPLETE
 * @dependencies src/detectors/types.ts, src/observability/sinks.ts
 * @lastModified 2026-10-18
 */

import type { DetectorOutputs, RawDetection, TaggedValue } from '../types/entities';
import type { DetectorFailureReason } from '../types/events';
import { toError } from '../types/common';
import { EventRecorder } from '../observability/sinks';
import { DETECTOR_DEFAULTS } from '../constants';
import type { Detector } from './types';

// ============================================================================
// Types
// ============================================================================

export interface RunDetectorsOptions {
  /** Per-detector limit; a slower detector counts as failed */
  timeoutMs?: number;
  /** Receives DETECTOR_FAILURE events */
  recorder?: EventRecorder;
}

export class DetectorTimeoutError extends Error {
  constructor(detector: string, timeoutMs: number) {
    super(`${detector} did not finish within ${timeoutMs}ms`);
    this.name = 'DetectorTimeoutError';
  }
}

type DetectorRun =
  | { ok: true; detections: RawDetection[]; tagged: TaggedValue[] }
  | { ok: false; reason: DetectorFailureReason; message: string };

// ============================================================================
// Fan-out
// ============================================================================

function withTimeout<T>(work: Promise<T>, detector: string, timeoutMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      reject(new DetectorTimeoutError(detector, timeoutMs));
    }, timeoutMs);

    work.then(
      (value) => {
        clearTimeout(timeout);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeout);
        reject(toError(error));
      }
    );
  });
}

async function runOne(text: string, detector: Detector, timeoutMs: number): Promise<DetectorRun> {
  try {
    if (detector.kind === 'span') {
      const detections = await withTimeout(detector.detect(text), detector.name, timeoutMs);
      return { ok: true, detections, tagged: [] };
    }
    const tagged = await withTimeout(detector.detect(text), detector.name, timeoutMs);
    return { ok: true, detections: [], tagged };
  } catch (error) {
    const cause = toError(error);
    return {
      ok: false,
      reason: cause instanceof DetectorTimeoutError ? 'DETECTOR_TIMEOUT' : 'DETECTOR_ERROR',
      message: cause.message,
    };
  }
}

/**
 * Run every detector concurrently. A detector that throws or times out
 * contributes nothing and is recorded as a DETECTOR_FAILURE event; the
 * others are unaffected. Output order follows the detector list.
 */
export async function runDetectors(
  text: string,
  detectors: readonly Detector[],
  options: RunDetectorsOptions = {}
): Promise<DetectorOutputs> {
  const timeoutMs = options.timeoutMs ?? DETECTOR_DEFAULTS.TIMEOUT_MS;
  const recorder = options.recorder ?? new EventRecorder();

  const runs = await Promise.all(detectors.map((detector) => runOne(text, detector, timeoutMs)));

  const detections: RawDetection[] = [];
  const tagged: TaggedValue[] = [];

  runs.forEach((run, index) => {
    const detector = detectors[index];
    if (detector === undefined) return;

    if (run.ok) {
      detections.push(...run.detections);
      tagged.push(...run.tagged);
      return;
    }

    recorder.record({
      category: 'DETECTOR_FAILURE',
      reason: run.reason,
      source: detector.source,
      detail: `${detector.name}: ${run.message}`,
    });
  });

  return { detections, tagged };
}
