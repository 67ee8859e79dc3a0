import { tokenize } from "@rebus-eval/core";
import { EXTRACTION_CONSTANTS } from "../constants";
import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { AnswerExtractor, ExtractionContext, acceptCandidates } from "./AnswerExtractor";

// Spans never cross sentence or clause punctuation.
const SEGMENT_SPLIT = /[.!?,;:()[\]{}"“”\n]+/;

export class NgramScanExtractor implements AnswerExtractor {
  stage = ExtractionStage.NGRAM_SCAN as const;

  constructor(private readonly ctx: ExtractionContext) {}

  tryExtract(text: string): CandidateSet | null {
    const { NGRAM_MIN_WORDS, NGRAM_MAX_WORDS } = EXTRACTION_CONSTANTS;
    const spans: string[] = [];
    for (const segment of text.split(SEGMENT_SPLIT)) {
      const words = tokenize(segment);
      for (let start = 0; start < words.length; start++) {
        for (let size = NGRAM_MIN_WORDS; size <= NGRAM_MAX_WORDS && start + size <= words.length; size++) {
          spans.push(words.slice(start, start + size).join(" "));
        }
      }
    }
    return acceptCandidates(this.stage, spans, this.ctx);
  }
}
