import { DEFAULT_LEXICON, ExtractionLexicon } from "./constants";
import { phraseAlternation } from "./phrases";

type CleaningLexicon = Pick<ExtractionLexicon, "leadingFillers" | "trailingFillers">;

export type Cleaner = (raw: string) => string;

const QUOTE_PAIRS: Record<string, string> = {
  '"': '"',
  "'": "'",
  "`": "`",
  "“": "”",
  "‘": "’",
  "«": "»",
};

const BULLET_RE = /^(?:[*\-•]|\d+[.)])\s+/;
const EMPHASIS_RE = /\*+|(?<![\p{L}\p{N}])_{1,2}|_{1,2}(?![\p{L}\p{N}])/gu;
const TERMINAL_PUNCT_RE = /[\s.,!?;:…]+$/u;
const LEADING_ARTICLE_RE = /^(?:the|a|an)\s+/i;

function stripEmphasis(text: string): string {
  return text.replace(BULLET_RE, "").replace(EMPHASIS_RE, "").trim();
}

function unwrapQuotes(text: string): string {
  if (text.length < 2) return text;
  const close = QUOTE_PAIRS[text[0]];
  if (close && text.endsWith(close)) return text.slice(1, -1).trim();
  return text;
}

function stripRepeatedly(text: string, pattern: RegExp): string {
  let current = text;
  let next = current.replace(pattern, "").trim();
  while (next !== current) {
    current = next;
    next = current.replace(pattern, "").trim();
  }
  return current;
}

/**
 * Light cleaning used for bracket markers: formatting and punctuation only, the
 * wording inside the marker is kept as written.
 */
export function cleanMarkerText(raw: string): string {
  let text = stripEmphasis((raw || "").trim());
  text = text.replace(TERMINAL_PUNCT_RE, "");
  text = unwrapQuotes(text);
  return text.replace(TERMINAL_PUNCT_RE, "").replace(/\s+/g, " ").trim();
}

export function createCleaner(lexicon: CleaningLexicon = DEFAULT_LEXICON): Cleaner {
  const leadingFiller = lexicon.leadingFillers.length
    ? new RegExp(`^(?:${phraseAlternation(lexicon.leadingFillers)})(?![\\p{L}\\p{N}_])[\\s:,\\-–—]*`, "iu")
    : null;
  const trailingFiller = lexicon.trailingFillers.length
    ? new RegExp(`\\s+(?:${phraseAlternation(lexicon.trailingFillers)})[\\s.,!?;:…]*$`, "iu")
    : null;

  return (raw: string): string => {
    let text = cleanMarkerText(raw);
    if (leadingFiller) text = stripRepeatedly(text, leadingFiller);
    text = text.replace(LEADING_ARTICLE_RE, "");
    text = stripRepeatedly(text, TERMINAL_PUNCT_RE);
    if (trailingFiller) text = stripRepeatedly(text, trailingFiller);
    return text.replace(TERMINAL_PUNCT_RE, "").trim();
  };
}
