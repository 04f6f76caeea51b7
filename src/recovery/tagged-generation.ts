/**
 * @module recovery/tagged-generation
 * @description Parse inline-tagged generation output into an ordered tagged-value sequence
 * @status COMPLETE
 * @dependencies src/types/entities.ts
 * @lastModified 2026-10-16
 */

import type { TaggedValue } from '../types/entities';
import { RECOVERY_DEFAULTS } from '../constants';

// ============================================================================
// Markup
// ============================================================================

/** `<tag>value</tag>`; the closing tag must match the opening one */
const TAGGED_VALUE_RE = /<([A-Za-z][\w-]*)>([\s\S]*?)<\/\1>/g;

/** Line-break token some models emit instead of a newline */
const LINE_BREAK_RE = /<LB>/g;

export interface ParseOptions {
  /** Characters of surrounding generation text kept as context */
  contextChars?: number;
}

interface Placed {
  value: string;
  tag: string;
  /** Position of the value in the tag-free generation text */
  plainStart: number;
  plainEnd: number;
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Read `<tag>value</tag>` markup. Context is taken from the generation text
 * with all markup removed, so neighbouring values count as context.
 *
 * @example
 * parseTaggedGeneration('Call <name>Sato</name> at <phone-number>03-1234-5678</phone-number>.');
 * // [
 * //   { value: 'Sato', tag: '<name>', leftContext: 'Call ', rightContext: ' at 03-1234-5678' },
 * //   { value: '03-1234-5678', tag: '<phone-number>', leftContext: 'Call Sato at ', rightContext: '.' },
 * // ]
 */
export function parseTaggedGeneration(output: string, options: ParseOptions = {}): TaggedValue[] {
  const contextChars = options.contextChars ?? RECOVERY_DEFAULTS.ANCHOR_CHARS;
  const source = output.replace(LINE_BREAK_RE, '\n');

  let plain = '';
  let consumed = 0;
  const placed: Placed[] = [];

  for (const match of source.matchAll(TAGGED_VALUE_RE)) {
    const tagName = match[1];
    const value = match[2];
    if (tagName === undefined || value === undefined || match.index === undefined) continue;

    plain += source.slice(consumed, match.index);
    const plainStart = plain.length;
    plain += value;
    placed.push({ value, tag: `<${tagName}>`, plainStart, plainEnd: plain.length });
    consumed = match.index + match[0].length;
  }
  plain += source.slice(consumed);

  return placed.map((p) => {
    const item: TaggedValue = { value: p.value, tag: p.tag };
    const left = plain.slice(Math.max(0, p.plainStart - contextChars), p.plainStart);
    const right = plain.slice(p.plainEnd, p.plainEnd + contextChars);
    if (left.length > 0) item.leftContext = left;
    if (right.length > 0) item.rightContext = right;
    return item;
  });
}
