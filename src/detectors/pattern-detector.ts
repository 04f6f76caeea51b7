/**
 * @module detectors/pattern-detector
 * @description Regex detector with context-word score boosting
 * @status COMPLETE
 * @dependencies src/detectors/patterns.ts
 * @lastModified 2026-10-18
 */

import type { RawDetection } from '../types/entities';
import { clampScore } from '../types/common';
import { PATTERN_CONTEXT } from '../constants';
import { ALL_PATTERNS, type RecognizerPattern } from './patterns';
import type { SpanDetector } from './types';

export interface PatternDetectorOptions {
  patterns?: readonly RecognizerPattern[];
  /** Characters before a match searched for context words */
  contextWindow?: number;
  /** Added to the score when a context word is found */
  contextBoost?: number;
}

/**
 * Whether any context word occurs in the window before `start`
 */
export function hasContext(
  text: string,
  start: number,
  words: readonly string[],
  window: number = PATTERN_CONTEXT.WINDOW_CHARS
): boolean {
  if (words.length === 0) return false;
  const before = text.slice(Math.max(0, start - window), start).toLowerCase();
  return words.some((word) => before.includes(word));
}

/**
 * Runs every pattern over the text. Needs no backend, so it is always ready.
 *
 * @example
 * await new PatternDetector().detect('TEL 03-1234-5678');
 * // [{ start: 4, end: 16, rawType: 'PHONE_NUMBER_JP', score: 1, source: 'PATTERN' }]
 */
export class PatternDetector implements SpanDetector {
  readonly kind = 'span';
  readonly source = 'PATTERN';
  readonly name = 'pattern';
  readonly isReady = true;

  private readonly patterns: readonly RecognizerPattern[];
  private readonly contextWindow: number;
  private readonly contextBoost: number;

  constructor(options: PatternDetectorOptions = {}) {
    this.patterns = options.patterns ?? ALL_PATTERNS;
    this.contextWindow = options.contextWindow ?? PATTERN_CONTEXT.WINDOW_CHARS;
    this.contextBoost = options.contextBoost ?? PATTERN_CONTEXT.SCORE_BOOST;
  }

  async load(): Promise<void> {
    return;
  }

  async dispose(): Promise<void> {
    return;
  }

  async detect(text: string): Promise<RawDetection[]> {
    return this.detectSync(text);
  }

  /**
   * Matches sorted by start, then end
   */
  detectSync(text: string): RawDetection[] {
    const detections: RawDetection[] = [];

    for (const pattern of this.patterns) {
      if (pattern.fastCheck && !pattern.fastCheck(text)) {
        continue;
      }

      // Clone regex to reset lastIndex; exec needs the global flag to advance
      const flags = pattern.pattern.flags.includes('g') ? pattern.pattern.flags : `${pattern.pattern.flags}g`;
      const regex = new RegExp(pattern.pattern.source, flags);
      let match: RegExpExecArray | null;

      while ((match = regex.exec(text)) !== null) {
        const value = match[0];
        if (value.length === 0) {
          regex.lastIndex++;
          continue;
        }
        if (pattern.accept && !pattern.accept(value)) continue;

        const boosted = hasContext(text, match.index, pattern.contextWords, this.contextWindow);
        detections.push({
          start: match.index,
          end: match.index + value.length,
          rawType: pattern.rawType,
          score: clampScore(boosted ? pattern.score + this.contextBoost : pattern.score),
          source: 'PATTERN',
        });
      }
    }

    return detections.sort((a, b) => a.start - b.start || a.end - b.end);
  }
}
