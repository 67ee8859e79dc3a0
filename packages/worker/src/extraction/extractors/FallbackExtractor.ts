import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { AnswerExtractor, ExtractionContext } from "./AnswerExtractor";

export function fallbackText(text: string, maxChars: number): string {
  return text.trim().slice(0, maxChars).toLowerCase().trim();
}

/** Last resort: the head of the response itself. Always yields a candidate. */
export class FallbackExtractor implements AnswerExtractor {
  stage = ExtractionStage.FALLBACK_RAW as const;

  constructor(private readonly ctx: ExtractionContext) {}

  tryExtract(text: string): CandidateSet {
    const head = fallbackText(text, this.ctx.fallbackMaxChars);
    return { stage: this.stage, candidates: [{ text: head, score: this.ctx.scorer.score(head) }] };
  }
}
