/**
 * @module pipeline/reconciler
 * @description Validate, normalize, recover, agree, merge and filter detector output
 * @status COMPLETE
 * @dependencies src/normalizer, src/recovery, src/consensus, src/merge, src/noise, src/observability
 * @lastModified 2026-10-18
 *
 * Per request:
 *   raw detections → offset validation → score floor → type normalization
 *   tagged values  → span recovery → score floor
 *   → consensus (strict only) → merge → noise filter
 *   → bound by the non-strict result (strict only)
 *
 * Every discard on the way becomes one event. Nothing after construction
 * throws except a missing text.
 */

import {
  candidateText,
  type DetectorOutputs,
  type DetectorSource,
  type EntityCandidate,
  type RawDetection,
} from '../types/entities';
import type { EventCategory, ObservabilitySink, ReconcileEvent } from '../types/events';
import { clampScore, ConfigurationError, type Span } from '../types/common';
import { EventRecorder, NULL_SINK, preview } from '../observability/sinks';
import { TypeNormalizer } from '../normalizer/type-normalizer';
import { recoverSpans } from '../recovery/span-recovery';
import { buildConsensus } from '../consensus/consensus-engine';
import { boundByReference, mergeCandidates } from '../merge/merger';
import { filterNoise } from '../noise/noise-filter';
import { buildAllowList } from '../noise/allow-list';
import { DEFAULT_CONFIG, deepFreeze, mappingTableErrors, validateConfig, type PipelineConfig } from './config';

// ============================================================================
// Types
// ============================================================================

/**
 * Candidate counts after each stage
 */
export interface ReconcileStats {
  detections: number;
  tagged: number;
  /** Candidates entering consensus/merge */
  accepted: number;
  afterConsensus: number;
  afterMerge: number;
  final: number;
  events: Partial<Record<EventCategory, number>>;
}

export interface ReconcileResult {
  /** Final non-overlapping (per type) candidates, sorted by start */
  candidates: EntityCandidate[];
  /** Every discard and rejection made for this request */
  events: readonly ReconcileEvent[];
  stats: ReconcileStats;
}

export interface ReconcilerOptions {
  /** Receives every event as it happens */
  sink?: ObservabilitySink;
}

export interface ReconcileCallOptions {
  /**
   * Recorder already holding this request's earlier events (detector
   * failures). Defaults to a fresh one writing to the reconciler's sink.
   */
  recorder?: EventRecorder;
}

// ============================================================================
// Helpers
// ============================================================================

function spanOf(candidate: Span): Span {
  return { start: candidate.start, end: candidate.end };
}

function hasValidOffsets(detection: RawDetection, textLength: number): boolean {
  return (
    Number.isInteger(detection.start) &&
    Number.isInteger(detection.end) &&
    detection.start >= 0 &&
    detection.start < detection.end &&
    detection.end <= textLength &&
    Number.isFinite(detection.score)
  );
}

// ============================================================================
// Reconciler
// ============================================================================

/**
 * Reconciliation pipeline bound to one configuration
 *
 * @example
 * const reconciler = new Reconciler(getPreset('STRICT'), { sink: createConsoleSink() });
 * const { candidates } = reconciler.reconcile(text, { detections, tagged });
 */
export class Reconciler {
  readonly config: PipelineConfig;
  private readonly allowList: ReadonlySet<string>;
  private readonly sink: ObservabilitySink;

  constructor(input: PipelineConfig = DEFAULT_CONFIG, options: ReconcilerOptions = {}) {
    // Own copy: later edits to the caller's object must not reach this instance
    const config = structuredClone(input);
    const mappingErrors = mappingTableErrors(config);
    if (mappingErrors.length > 0) {
      throw new ConfigurationError('EMPTY_MAPPING_TABLE', mappingErrors.join('; '), mappingErrors);
    }

    const validation = validateConfig(config);
    if (!validation.valid) {
      throw new ConfigurationError('INVALID_CONFIG', `Invalid pipeline config: ${validation.errors.join('; ')}`, validation.errors);
    }

    this.config = deepFreeze(config);
    this.allowList = buildAllowList(config.noise.allowList);
    this.sink = options.sink ?? NULL_SINK;
  }

  /**
   * Run the pipeline over one request. Always returns a (possibly empty) list.
   */
  reconcile(text: string, outputs: DetectorOutputs, options: ReconcileCallOptions = {}): ReconcileResult {
    if (typeof text !== 'string') {
      throw new ConfigurationError('MISSING_TEXT', 'Text to reconcile must be a string');
    }

    const recorder = options.recorder ?? this.createRecorder();
    const normalizer = new TypeNormalizer(this.config.vocabularies, this.config.sourceVocabulary, recorder);

    const fromDetections = this.acceptDetections(text, outputs.detections, normalizer, recorder);
    const fromTagged = this.recoverTagged(text, outputs, normalizer, recorder);
    const accepted = [...fromDetections, ...fromTagged];

    const agreed = this.config.strict ? this.applyConsensus(accepted, recorder) : accepted;
    const merged = this.applyMerge(text, agreed, recorder);
    const filtered = this.applyNoise(text, merged, recorder);
    const final = this.config.strict ? this.applyNonStrictBound(text, accepted, filtered, recorder) : filtered;

    return {
      candidates: final,
      events: recorder.events,
      stats: {
        detections: outputs.detections.length,
        tagged: outputs.tagged?.length ?? 0,
        accepted: accepted.length,
        afterConsensus: agreed.length,
        afterMerge: merged.length,
        final: final.length,
        events: recorder.countByCategory(),
      },
    };
  }

  /**
   * Event recorder bound to this reconciler's sink
   */
  createRecorder(): EventRecorder {
    return new EventRecorder(this.sink);
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private passesMinScore(
    source: DetectorSource,
    score: number,
    recorder: EventRecorder,
    event: { span: Span; rawType: string; value?: string }
  ): boolean {
    const minimum = this.config.minScores[source];
    if (minimum === undefined || score >= minimum) return true;

    recorder.record({
      category: 'SCORE_REJECT',
      reason: 'BELOW_MIN_SCORE',
      source,
      ...event,
      detail: `score ${score.toFixed(2)} < ${minimum}`,
    });
    return false;
  }

  private acceptDetections(
    text: string,
    detections: readonly RawDetection[],
    normalizer: TypeNormalizer,
    recorder: EventRecorder
  ): EntityCandidate[] {
    const candidates: EntityCandidate[] = [];

    for (const detection of detections) {
      if (!hasValidOffsets(detection, text.length)) {
        recorder.record({
          category: 'RECOVERY_DISCARD',
          reason: 'NO_MATCH',
          source: detection.source,
          rawType: detection.rawType,
          detail: `invalid offsets [${detection.start},${detection.end}) for text of length ${text.length}`,
        });
        continue;
      }

      const span = spanOf(detection);
      if (!this.passesMinScore(detection.source, detection.score, recorder, { span, rawType: detection.rawType })) {
        continue;
      }

      candidates.push({
        ...span,
        canonicalType: normalizer.resolve(detection.rawType, detection.source),
        rawType: detection.rawType,
        score: clampScore(detection.score),
        source: detection.source,
      });
    }

    return candidates;
  }

  private recoverTagged(
    text: string,
    outputs: DetectorOutputs,
    normalizer: TypeNormalizer,
    recorder: EventRecorder
  ): EntityCandidate[] {
    if (!outputs.tagged || outputs.tagged.length === 0) return [];

    const result = recoverSpans(
      text,
      outputs.tagged,
      (tag) => normalizer.resolve(tag, 'GENERATIVE'),
      this.config.recovery
    );

    for (const discard of result.discards) {
      recorder.record({
        category: 'RECOVERY_DISCARD',
        reason: discard.reason,
        source: 'GENERATIVE',
        value: discard.value,
        rawType: discard.tag,
        detail: discard.detail,
      });
    }

    return result.candidates.filter((candidate) =>
      this.passesMinScore('GENERATIVE', candidate.score, recorder, {
        span: spanOf(candidate),
        rawType: candidate.rawType,
        value: candidateText(text, candidate),
      })
    );
  }

  private applyConsensus(candidates: EntityCandidate[], recorder: EventRecorder): EntityCandidate[] {
    const result = buildConsensus(candidates, this.config.consensus);

    for (const rejection of result.rejected) {
      recorder.record({
        category: 'CONSENSUS_REJECT',
        reason: rejection.reason,
        source: rejection.candidate.source,
        span: spanOf(rejection.candidate),
        rawType: rejection.candidate.rawType,
        detail: rejection.detail,
      });
    }

    return result.candidates;
  }

  private applyMerge(text: string, candidates: EntityCandidate[], recorder: EventRecorder): EntityCandidate[] {
    const result = mergeCandidates(candidates, text.length, { priority: this.config.priority });

    for (const drop of result.dropped) {
      recorder.record({
        category: 'MERGE_DROP',
        reason: drop.reason,
        source: drop.candidate.source,
        span: spanOf(drop.candidate),
        rawType: drop.candidate.rawType,
        detail: drop.detail,
      });
    }

    return result.candidates;
  }

  /**
   * Strict output may not exceed the non-strict output of the same request:
   * each non-strict candidate admits at most one strict one of its type inside it.
   */
  private applyNonStrictBound(
    text: string,
    accepted: EntityCandidate[],
    strict: EntityCandidate[],
    recorder: EventRecorder
  ): EntityCandidate[] {
    const silent = new EventRecorder(NULL_SINK);
    const lenient = this.applyNoise(text, this.applyMerge(text, accepted, silent), silent);
    const result = boundByReference(strict, lenient);

    for (const drop of result.dropped) {
      recorder.record({
        category: 'MERGE_DROP',
        reason: drop.reason,
        source: drop.candidate.source,
        span: spanOf(drop.candidate),
        rawType: drop.candidate.rawType,
        detail: drop.detail,
      });
    }

    return result.candidates;
  }

  private applyNoise(text: string, candidates: EntityCandidate[], recorder: EventRecorder): EntityCandidate[] {
    const result = filterNoise(text, candidates, {
      minContentRatio: this.config.noise.minContentRatio,
      allowList: this.allowList,
    });

    for (const rejection of result.rejected) {
      recorder.record({
        category: 'NOISE_REJECT',
        reason: rejection.reason,
        source: rejection.candidate.source,
        span: spanOf(rejection.candidate),
        rawType: rejection.candidate.rawType,
        value: preview(candidateText(text, rejection.candidate)),
        detail: rejection.detail,
      });
    }

    return result.candidates;
  }
}
