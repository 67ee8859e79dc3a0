export enum ExtractionStage {
  BRACKET_MARKER = "BRACKET_MARKER",
  QUOTED = "QUOTED",
  KEYWORD_INTRO = "KEYWORD_INTRO",
  STANDALONE_LINE = "STANDALONE_LINE",
  FIRST_SENTENCE = "FIRST_SENTENCE",
  NGRAM_SCAN = "NGRAM_SCAN",
  FALLBACK_RAW = "FALLBACK_RAW",
}

export const STAGE_ORDER: readonly ExtractionStage[] = [
  ExtractionStage.BRACKET_MARKER,
  ExtractionStage.QUOTED,
  ExtractionStage.KEYWORD_INTRO,
  ExtractionStage.STANDALONE_LINE,
  ExtractionStage.FIRST_SENTENCE,
  ExtractionStage.NGRAM_SCAN,
  ExtractionStage.FALLBACK_RAW,
];
