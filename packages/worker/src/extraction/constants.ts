export const EXTRACTION_CONSTANTS = {
  MIN_ANSWER_CHARS: 3,
  MAX_ANSWER_CHARS: 100,
  MIN_SINGLE_WORD_CHARS: 8,
  DEFAULT_WORD_BOUNDS: { minWords: 1, maxWords: 10 },
  MARKER_WORD_BOUNDS: { minWords: 2, maxWords: 8 },
  NGRAM_MIN_WORDS: 3,
  NGRAM_MAX_WORDS: 8,
  FALLBACK_MAX_CHARS: 50,
} as const;

export interface WordBounds {
  minWords: number;
  maxWords: number;
}

export interface ExtractionLexicon {
  /** Meta-commentary that marks a span as explanation rather than an answer. */
  descriptionMarkers: readonly string[];
  /** Phrases that introduce the answer in prose. Order is priority. */
  introducers: readonly string[];
  leadingFillers: readonly string[];
  trailingFillers: readonly string[];
  /** Words after which a keyword-intro span stops being the answer. */
  clauseConnectives: readonly string[];
}

export const DEFAULT_LEXICON: ExtractionLexicon = Object.freeze({
  descriptionMarkers: Object.freeze([
    "this idiom",
    "the idiom",
    "idiom is",
    "represents",
    "refers to",
    "let me think",
    "i can see",
    "i see",
    "looking at",
    "the image",
    "this image",
    "the picture",
    "the puzzle",
    "this puzzle",
    "rebus",
    "depicts",
    "shows",
    "shown",
    "written",
    "drawn",
    "illustration",
    "the word",
    "the words",
    "the letter",
    "the letters",
    "stacked",
    "positioned",
    "arranged",
    "suggests",
    "step by step",
  ]),
  introducers: Object.freeze([
    "idiom is",
    "answer is",
    "solution is",
    "phrase is",
    "represents",
    "suggests",
    "therefore",
  ]),
  leadingFillers: Object.freeze([
    "the idiom is",
    "the answer is",
    "the solution is",
    "i think",
    "i believe",
    "this is",
    "it is",
    "it's",
  ]),
  trailingFillers: Object.freeze(["idiom", "puzzle", "phrase", "expression"]),
  clauseConnectives: Object.freeze(["so", "because", "since", "which", "hence"]),
});
