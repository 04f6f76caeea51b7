/**
 * @module noise/allow-list
 * @description Dictionary (.dic) parsing for terms that must never be reported
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-16
 *
 * Line format:
 *   Kubernetes
 *   AI/alias[AI|Artificial Intelligence]
 *   node.js/js[node]
 *   # comment
 */

const SUFFIX_SPLIT_RE = /\/(?:alias|js)\[/;
const ALIAS_RE = /\/alias\[([^\]]+)\]/;
const JS_RE = /\/js\[([^\]]+)\]/;

/**
 * Form used for allow-list comparison: lowercase, no whitespace
 */
export function normalizeTerm(term: string): string {
  return term.normalize('NFKC').toLowerCase().replace(/\s+/g, '');
}

function listMembers(match: RegExpExecArray | null): string[] {
  const body = match?.[1];
  if (body === undefined) return [];
  return body
    .split('|')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

/**
 * Extract every term (main terms and aliases) from dictionary content.
 * Order of first appearance is kept; duplicates are dropped.
 *
 * @example
 * parseDictionary('AI/alias[AI|Artificial Intelligence]\nnode.js/js[node]');
 * // ['AI', 'Artificial Intelligence', 'node.js', 'node']
 */
export function parseDictionary(content: string): string[] {
  const terms: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const main = (line.split(SUFFIX_SPLIT_RE)[0] ?? '').trim();
    if (main) terms.push(main);

    terms.push(...listMembers(ALIAS_RE.exec(line)));
    terms.push(...listMembers(JS_RE.exec(line)));
  }

  return [...new Set(terms)];
}

/**
 * Normalized lookup set for a list of terms
 */
export function buildAllowList(terms: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const term of terms) {
    const normalized = normalizeTerm(term);
    if (normalized) set.add(normalized);
  }
  return set;
}
