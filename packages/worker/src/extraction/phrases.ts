const WORD_CHAR = "[\\p{L}\\p{N}_]";

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word alternation of `phrases`, longest first so overlapping phrases prefer the fuller one. */
export function phraseAlternation(phrases: readonly string[]): string {
  const sorted = [...phrases].sort((a, b) => b.length - a.length);
  return sorted.map((p) => escapeRegExp(p).replace(/\s+/g, "\\s+")).join("|");
}

export function wholeWordRegex(phrases: readonly string[], flags = "iu"): RegExp {
  if (!phrases.length) return /(?!)/u;
  return new RegExp(`(?<!${WORD_CHAR})(?:${phraseAlternation(phrases)})(?!${WORD_CHAR})`, flags);
}
