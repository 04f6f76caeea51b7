/**
 * @module detectors/orchestrator.test
 * @description Tests for detector fan-out and the detection service
 * @status COMPLETE
 * @dependencies src/detectors/orchestrator.ts, src/detectors/detection-service.ts
 * @lastModified 2026-10-18
 */

import { describe, it, expect, vi } from 'vitest';
import { runDetectors } from './orchestrator';
import { DetectionService } from './detection-service';
import { PatternDetector } from './pattern-detector';
import type { SpanDetector, TaggingDetector } from './types';
import { Reconciler } from '../pipeline/reconciler';
import { CollectingSink, EventRecorder } from '../observability/sinks';
import type { OffsetSource, RawDetection, TaggedValue } from '../types/entities';

// ============================================================================
// Stub Detectors
// ============================================================================

function createSpanDetector(
  name: string,
  source: OffsetSource,
  detect: (text: string) => Promise<RawDetection[]>
): SpanDetector {
  return {
    kind: 'span',
    name,
    source,
    isReady: true,
    load: vi.fn(async () => undefined),
    dispose: vi.fn(async () => undefined),
    detect,
  };
}

function createTaggingDetector(name: string, detect: (text: string) => Promise<TaggedValue[]>): TaggingDetector {
  return {
    kind: 'tagging',
    name,
    source: 'GENERATIVE',
    isReady: true,
    load: async () => undefined,
    dispose: async () => undefined,
    detect,
  };
}

const crashing = createSpanDetector('broken-ner', 'NER', async () => {
  throw new Error('model crashed');
});

const hanging = createTaggingDetector('slow-llm', () => new Promise<TaggedValue[]>(() => undefined));

describe('detectors/orchestrator', () => {
  describe('runDetectors', () => {
    it('should collect span and tagged output in detector order', async () => {
      const tagger = createTaggingDetector('llm', async () => [{ value: 'Sato', tag: '<name>' }]);
      const outputs = await runDetectors('TEL 03-1234-5678', [new PatternDetector(), tagger]);

      expect(outputs.detections.map((d) => d.rawType)).toEqual(['PHONE_NUMBER_JP']);
      expect(outputs.tagged).toEqual([{ value: 'Sato', tag: '<name>' }]);
    });

    it('should turn failures and timeouts into events', async () => {
      const sink = new CollectingSink();
      const outputs = await runDetectors('TEL 03-1234-5678', [crashing, new PatternDetector(), hanging], {
        timeoutMs: 20,
        recorder: new EventRecorder(sink),
      });

      expect(outputs.detections).toHaveLength(1);
      expect(outputs.tagged).toEqual([]);
      expect(sink.events).toEqual([
        {
          category: 'DETECTOR_FAILURE',
          reason: 'DETECTOR_ERROR',
          source: 'NER',
          detail: 'broken-ner: model crashed',
        },
        {
          category: 'DETECTOR_FAILURE',
          reason: 'DETECTOR_TIMEOUT',
          source: 'GENERATIVE',
          detail: 'slow-llm: slow-llm did not finish within 20ms',
        },
      ]);
    });
  });

  describe('DetectionService', () => {
    it('should load detectors on start and release them on stop', async () => {
      const ner = createSpanDetector('ner', 'NER', async () => []);
      const service = new DetectionService([ner], new Reconciler());

      await service.start();
      expect(service.isRunning).toBe(true);
      expect(ner.load).toHaveBeenCalledTimes(1);

      await service.stop();
      expect(service.isRunning).toBe(false);
      expect(ner.dispose).toHaveBeenCalledTimes(1);
    });

    it('should stay stopped when a detector fails to load', async () => {
      const broken = createSpanDetector('ner', 'NER', async () => []);
      broken.load = async () => {
        throw new Error('no weights');
      };
      const service = new DetectionService([broken], new Reconciler());

      await expect(service.start()).rejects.toThrow('no weights');
      expect(service.isRunning).toBe(false);
    });

    it('should reconcile detector output and report failures alongside', async () => {
      const service = new DetectionService([new PatternDetector(), crashing], new Reconciler(), { timeoutMs: 50 });
      const result = await service.analyze('TEL 090-1234-5678');

      expect(result.outputs.detections).toHaveLength(2);
      expect(result.candidates).toEqual([
        { start: 4, end: 17, canonicalType: 'PHONE', rawType: 'PHONE_NUMBER_JP', score: 1, source: 'PATTERN' },
      ]);
      expect(result.events.map((e) => e.category)).toEqual(['DETECTOR_FAILURE']);
      expect(result.stats.events).toEqual({ DETECTOR_FAILURE: 1 });
    });
  });
});
