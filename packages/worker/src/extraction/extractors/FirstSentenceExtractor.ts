import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { AnswerExtractor, ExtractionContext, acceptCandidates } from "./AnswerExtractor";

const SENTENCE_SPLIT = /(?<=[.!?])\s+/;

export class FirstSentenceExtractor implements AnswerExtractor {
  stage = ExtractionStage.FIRST_SENTENCE as const;

  constructor(private readonly ctx: ExtractionContext) {}

  tryExtract(text: string): CandidateSet | null {
    const first = text.trim().split(SENTENCE_SPLIT)[0] ?? "";
    return acceptCandidates(this.stage, [first], this.ctx);
  }
}
