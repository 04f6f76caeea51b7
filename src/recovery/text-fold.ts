/**
 * @module recovery/text-fold
 * @description Whitespace/punctuation-insensitive views of text that keep a map back to source offsets
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-16
 */

// ============================================================================
// Character Classes
// ============================================================================

const SKIPPABLE_RE = /^[\s\p{P}\p{S}]$/u;

/**
 * True for whitespace, punctuation and symbol characters
 */
export function isSkippable(char: string): boolean {
  return SKIPPABLE_RE.test(char);
}

/**
 * Compatibility-fold one character: full-width forms become ASCII, case is
 * dropped. Characters whose compatibility form is longer than one character
 * (ligatures, circled numbers) are kept as they are.
 */
export function foldChar(char: string): string {
  const compat = char.normalize('NFKC');
  const folded = Array.from(compat).length === 1 ? compat : char;
  return folded.toLowerCase();
}

// ============================================================================
// Folded View
// ============================================================================

/**
 * Folded copy of a region of text. `starts[i]` and `ends[i]` give the source
 * range of the character that produced folded code unit `i`.
 */
export interface FoldedView {
  folded: string;
  starts: number[];
  ends: number[];
}

/**
 * Fold `text[from, to)`, dropping whitespace and punctuation
 */
export function buildFoldedView(text: string, from: number = 0, to: number = text.length): FoldedView {
  let folded = '';
  const starts: number[] = [];
  const ends: number[] = [];

  let index = from;
  while (index < to) {
    const codePoint = text.codePointAt(index);
    if (codePoint === undefined) break;
    const char = String.fromCodePoint(codePoint);
    const next = index + char.length;

    if (!isSkippable(char)) {
      const f = foldChar(char);
      folded += f;
      for (let i = 0; i < f.length; i++) {
        starts.push(index);
        ends.push(next);
      }
    }
    index = next;
  }

  return { folded, starts, ends };
}

/**
 * Folded form of a whole string
 */
export function foldString(value: string): string {
  return buildFoldedView(value).folded;
}

/**
 * Find `needle` (already folded) in the view and map the hit back to a source
 * span
 */
export function findInView(view: FoldedView, foldedNeedle: string, fromFolded: number = 0): { start: number; end: number } | null {
  if (foldedNeedle.length === 0) return null;
  const idx = view.folded.indexOf(foldedNeedle, fromFolded);
  if (idx < 0) return null;

  const start = view.starts[idx];
  const end = view.ends[idx + foldedNeedle.length - 1];
  if (start === undefined || end === undefined) return null;
  return { start, end };
}

// ============================================================================
// Trimming
// ============================================================================

/**
 * Shrink `[start, end)` until both ends sit on content characters.
 * Returns null when nothing but whitespace and punctuation is left.
 */
export function trimToContent(text: string, start: number, end: number): { start: number; end: number } | null {
  let s = start;
  let e = end;
  while (s < e && isSkippable(text.charAt(s))) s++;
  while (e > s && isSkippable(text.charAt(e - 1))) e--;
  return s < e ? { start: s, end: e } : null;
}

/**
 * Shrink `[start, end)` past whitespace only
 */
export function trimWhitespace(text: string, start: number, end: number): { start: number; end: number } | null {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(text.charAt(s))) s++;
  while (e > s && /\s/.test(text.charAt(e - 1))) e--;
  return s < e ? { start: s, end: e } : null;
}

// ============================================================================
// Similarity
// ============================================================================

/**
 * Levenshtein edit distance over UTF-16 code units
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = new Array<number>(b.length + 1);
  let current = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) previous[j] = j;

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charCodeAt(i - 1) === b.charCodeAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

/**
 * Similarity in [0, 1]; 1 means identical
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a, b) / longest;
}
