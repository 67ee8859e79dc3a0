import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";
import { AnswerExtractor, ExtractionContext, acceptCandidates } from "./AnswerExtractor";

// Single quotes only count when they are not apostrophes inside a word.
const QUOTE_RE = /"([^"\n]+)"|“([^”\n]+)”|`([^`\n]+)`|(?<![\p{L}\p{N}])'([^'\n]+?)'(?![\p{L}\p{N}])|‘([^’\n]+)’/gu;

export class QuotedTextExtractor implements AnswerExtractor {
  stage = ExtractionStage.QUOTED as const;

  constructor(private readonly ctx: ExtractionContext) {}

  tryExtract(text: string): CandidateSet | null {
    const raw: string[] = [];
    for (const match of text.matchAll(QUOTE_RE)) {
      const inner = match.slice(1).find((group) => group !== undefined);
      if (inner) raw.push(inner);
    }
    return acceptCandidates(this.stage, raw, this.ctx);
  }
}
