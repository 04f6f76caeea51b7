/**
 * @module detectors/detection-service
 * @description Detectors and a reconciler behind one analyze() call
 * @status COMPLETE
 * @dependencies src/detectors/orchestrator.ts, src/pipeline/reconciler.ts
 * @lastModified 2026-10-18
 */

import type { DetectorOutputs } from '../types/entities';
import type { Reconciler, ReconcileResult } from '../pipeline/reconciler';
import { runDetectors } from './orchestrator';
import type { Detector } from './types';

export interface DetectionServiceOptions {
  /** Per-detector timeout for each analyze() call */
  timeoutMs?: number;
}

export interface AnalysisResult extends ReconcileResult {
  /** What the detectors produced before reconciliation */
  outputs: DetectorOutputs;
}

type ServiceState = 'stopped' | 'starting' | 'running';

/**
 * Owns detector lifecycles. `start()` loads every detector, `stop()`
 * releases them; `analyze()` works in either state, loading lazily.
 *
 * @example
 * const service = new DetectionService([new PatternDetector()], new Reconciler());
 * await service.start();
 * const { candidates } = await service.analyze(text);
 * await service.stop();
 */
export class DetectionService {
  private state: ServiceState = 'stopped';

  constructor(
    private readonly detectors: readonly Detector[],
    private readonly reconciler: Reconciler,
    private readonly options: DetectionServiceOptions = {}
  ) {}

  get isRunning(): boolean {
    return this.state === 'running';
  }

  async start(): Promise<void> {
    if (this.state !== 'stopped') {
      return;
    }

    this.state = 'starting';
    try {
      await Promise.all(this.detectors.map((detector) => detector.load()));
      this.state = 'running';
    } catch (error) {
      this.state = 'stopped';
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopped';
    await Promise.all(this.detectors.map((detector) => detector.dispose()));
  }

  /**
   * Run all detectors on the text and reconcile their output. Detector
   * failures appear among the result's events.
   */
  async analyze(text: string): Promise<AnalysisResult> {
    const recorder = this.reconciler.createRecorder();
    const outputs = await runDetectors(text, this.detectors, {
      recorder,
      ...(this.options.timeoutMs === undefined ? {} : { timeoutMs: this.options.timeoutMs }),
    });

    return {
      ...this.reconciler.reconcile(text, outputs, { recorder }),
      outputs,
    };
  }
}
