import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { AnswerExtractor, ExtractionContext, acceptCandidates } from "./AnswerExtractor";

export class StandaloneLineExtractor implements AnswerExtractor {
  stage = ExtractionStage.STANDALONE_LINE as const;

  constructor(private readonly ctx: ExtractionContext) {}

  tryExtract(text: string): CandidateSet | null {
    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
    for (const line of lines) {
      if (this.ctx.classifier.isDescription(line)) continue;
      const accepted = acceptCandidates(this.stage, [line], this.ctx);
      if (accepted) return accepted;
    }
    return null;
  }
}
