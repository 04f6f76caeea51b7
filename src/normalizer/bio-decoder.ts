/**
 * @module normalizer/bio-decoder
 * @description Two-state machine turning token-classifier labels into entity spans
 * @status COMPLETE
 * @dependencies src/normalizer/type-normalizer.ts
 * @lastModified 2026-10-15
 *
 * States are OUTSIDE and INSIDE(type). Each token label drives one transition:
 *
 * | state        | label         | next state  | effect                        |
 * |--------------|---------------|-------------|-------------------------------|
 * | any          | O             | OUTSIDE     | close open entity             |
 * | any          | B-X / S-X     | INSIDE(X)   | close open entity, open X     |
 * | INSIDE(X)    | I-X / E-X     | INSIDE(X)   | extend (E-X closes after)     |
 * | INSIDE(Y)    | I-X / E-X     | OUTSIDE     | close Y, drop orphan token    |
 * | OUTSIDE      | I-X / E-X     | OUTSIDE     | drop orphan token             |
 * | INSIDE(X)    | X (no prefix) | INSIDE(X)   | extend                        |
 * | other        | X (no prefix) | INSIDE(X)   | close open entity, open X     |
 * | any          | unmapped      | OUTSIDE     | close open entity             |
 */

import type { CanonicalType } from '../types/entities';
import {
  DEFAULT_VOCABULARIES,
  normalize,
  parseLabel,
  type Vocabularies,
} from './type-normalizer';

// ============================================================================
// Types
// ============================================================================

/**
 * One classified token with its character offsets
 */
export interface TokenLabel {
  label: string;
  start: number;
  end: number;
  score: number;
}

export interface DecodedEntity {
  start: number;
  end: number;
  /** Label without prefix, as the model spelled it */
  rawType: string;
  canonicalType: CanonicalType;
  /** Mean token score */
  score: number;
  tokenCount: number;
}

export type DecoderState =
  | { kind: 'OUTSIDE' }
  | {
      kind: 'INSIDE';
      canonicalType: CanonicalType;
      rawType: string;
      start: number;
      end: number;
      scoreSum: number;
      tokenCount: number;
    };

export interface StepResult {
  state: DecoderState;
  /** Entities closed by this transition, in order */
  emitted: DecodedEntity[];
  /** Set when the token's label had no mapping */
  unmapped?: string;
  /** Set when the token was an I-/E- label with nothing to continue */
  orphan?: boolean;
}

export interface DecodeResult {
  entities: DecodedEntity[];
  /** Distinct labels that had no mapping */
  unmappedLabels: string[];
  /** Continuation tokens that were dropped */
  orphanCount: number;
}

export const OUTSIDE: DecoderState = { kind: 'OUTSIDE' };

// ============================================================================
// Transitions
// ============================================================================

function close(state: DecoderState): DecodedEntity[] {
  if (state.kind === 'OUTSIDE') return [];
  return [
    {
      start: state.start,
      end: state.end,
      rawType: state.rawType,
      canonicalType: state.canonicalType,
      score: state.scoreSum / state.tokenCount,
      tokenCount: state.tokenCount,
    },
  ];
}

function open(token: TokenLabel, rawType: string, canonicalType: CanonicalType): DecoderState {
  return {
    kind: 'INSIDE',
    canonicalType,
    rawType,
    start: token.start,
    end: token.end,
    scoreSum: token.score,
    tokenCount: 1,
  };
}

function extend(state: Extract<DecoderState, { kind: 'INSIDE' }>, token: TokenLabel): DecoderState {
  return {
    ...state,
    end: Math.max(state.end, token.end),
    scoreSum: state.scoreSum + token.score,
    tokenCount: state.tokenCount + 1,
  };
}

/**
 * Apply one token to the decoder state
 */
export function step(
  state: DecoderState,
  token: TokenLabel,
  vocabulary: string,
  vocabularies: Vocabularies = DEFAULT_VOCABULARIES
): StepResult {
  const parsed = parseLabel(token.label);
  if (parsed.outside) {
    return { state: OUTSIDE, emitted: close(state) };
  }

  const canonicalType = normalize(parsed.label, vocabulary, vocabularies);
  if (canonicalType === 'UNKNOWN') {
    return { state: OUTSIDE, emitted: close(state), unmapped: parsed.label };
  }

  const sameEntity = state.kind === 'INSIDE' && state.canonicalType === canonicalType;

  if (parsed.prefix === null) {
    if (state.kind === 'INSIDE' && sameEntity) {
      return { state: extend(state, token), emitted: [] };
    }
    return { state: open(token, parsed.label, canonicalType), emitted: close(state) };
  }

  switch (parsed.prefix) {
    case 'B':
      return { state: open(token, parsed.label, canonicalType), emitted: close(state) };

    case 'S':
    case 'U': {
      const single = open(token, parsed.label, canonicalType);
      return { state: OUTSIDE, emitted: [...close(state), ...close(single)] };
    }

    default: {
      // I-, E-, L-: continuation of the open entity
      if (state.kind === 'INSIDE' && sameEntity) {
        const extended = extend(state, token);
        if (parsed.prefix === 'I') {
          return { state: extended, emitted: [] };
        }
        return { state: OUTSIDE, emitted: close(extended) };
      }
      return { state: OUTSIDE, emitted: close(state), orphan: true };
    }
  }
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Walk a token sequence and collect entity spans. Special tokens (zero-width
 * offsets such as [CLS]/[SEP]) are skipped.
 *
 * @example
 * decodeTokenLabels([
 *   { label: 'B-PER', start: 0, end: 4, score: 0.9 },
 *   { label: 'I-PER', start: 5, end: 10, score: 0.8 },
 * ], 'transformer');
 * // entities: [{ start: 0, end: 10, rawType: 'PER', canonicalType: 'PERSON', ... }]
 */
export function decodeTokenLabels(
  tokens: readonly TokenLabel[],
  vocabulary: string,
  vocabularies: Vocabularies = DEFAULT_VOCABULARIES
): DecodeResult {
  const entities: DecodedEntity[] = [];
  const unmapped = new Set<string>();
  let orphanCount = 0;
  let state: DecoderState = OUTSIDE;

  for (const token of tokens) {
    if (token.start === token.end) continue;

    const result = step(state, token, vocabulary, vocabularies);
    entities.push(...result.emitted);
    if (result.unmapped !== undefined) unmapped.add(result.unmapped);
    if (result.orphan) orphanCount++;
    state = result.state;
  }

  entities.push(...close(state));

  return { entities, unmappedLabels: [...unmapped], orphanCount };
}
