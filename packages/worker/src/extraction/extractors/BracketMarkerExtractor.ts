import { countWords } from "@rebus-eval/core";
import { cleanMarkerText } from "../cleanCandidate";
import { EXTRACTION_CONSTANTS } from "../constants";
import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { AnswerExtractor, ExtractionContext } from "./AnswerExtractor";

const MARKER_RE = /\{\{\{([\s\S]*?)\}\}\}/g;

/**
 * The prompt asks for the final answer as {{{answer}}}. The first marker with a
 * sensible word count wins even when it does not look like an idiom.
 */
export class BracketMarkerExtractor implements AnswerExtractor {
  stage = ExtractionStage.BRACKET_MARKER as const;

  constructor(private readonly ctx: ExtractionContext) {}

  tryExtract(text: string): CandidateSet | null {
    const { minWords, maxWords } = EXTRACTION_CONSTANTS.MARKER_WORD_BOUNDS;
    for (const match of text.matchAll(MARKER_RE)) {
      const inner = cleanMarkerText(match[1]);
      const words = countWords(inner);
      if (words < minWords || words > maxWords) continue;
      return { stage: this.stage, candidates: [{ text: inner, score: this.ctx.scorer.score(inner) }] };
    }
    return null;
  }
}
