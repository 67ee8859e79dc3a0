const DASH_RUN_RE = /[-_‐-―]+/g;
const WHITESPACE_RE = /\s+/g;
const LEADING_EDGE_RE = /^[^\p{L}\p{N}_&]+/u;
const TRAILING_EDGE_RE = /[^\p{L}\p{N}_&]+$/u;
const LEADING_ARTICLE_RE = /^(?:a|an|the)\s+/;

// Whole-word shorthand rewrites; none of the replacements contains a key.
const WORD_REWRITES: ReadonlyArray<[RegExp, string]> = [
  [/(?<![\p{L}\p{N}_])and(?![\p{L}\p{N}_])/gu, "&"],
  [/(?<![\p{L}\p{N}_])u(?![\p{L}\p{N}_])/gu, "you"],
  [/(?<![\p{L}\p{N}_])r(?![\p{L}\p{N}_])/gu, "are"],
];

function normalizePass(input: string): string {
  let text = input.toLowerCase();
  text = text.replace(DASH_RUN_RE, " ");
  for (const [pattern, replacement] of WORD_REWRITES) {
    text = text.replace(pattern, replacement);
  }
  text = text.replace(WHITESPACE_RE, " ").trim();
  text = text.replace(LEADING_EDGE_RE, "").replace(TRAILING_EDGE_RE, "");
  text = text.replace(LEADING_ARTICLE_RE, "");
  return text.trim();
}

/**
 * Canonical form used for every answer comparison.
 *
 * After the first pass later passes can only delete characters, so the loop
 * terminates, and running until stable makes the function idempotent
 * ("the the cat" -> "cat").
 */
export function normalizeIdiom(input: string): string {
  if (!input) return "";
  let current = normalizePass(input);
  let next = normalizePass(current);
  while (next !== current) {
    current = next;
    next = normalizePass(current);
  }
  return current;
}

export function tokenize(text: string): string[] {
  return text.split(WHITESPACE_RE).filter(Boolean);
}

export function countWords(text: string): number {
  return tokenize(text).length;
}
