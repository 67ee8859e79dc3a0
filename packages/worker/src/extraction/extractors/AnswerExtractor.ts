import { CandidateClassifier } from "../CandidateClassifier";
import { CandidateScorer } from "../CandidateScorer";
import { Cleaner } from "../cleanCandidate";
import { ExtractionLexicon } from "../constants";
import { CandidateSet } from "../types/CandidateSet";
import { ExtractionStage } from "../types/ExtractionStage";

export interface AnswerExtractor {
  stage: ExtractionStage;
  /** null when the stage has nothing to offer for this text. */
  tryExtract(text: string): CandidateSet | null;
}

/** Shared collaborators handed to every stage at construction. */
export interface ExtractionContext {
  lexicon: ExtractionLexicon;
  classifier: CandidateClassifier;
  scorer: CandidateScorer;
  clean: Cleaner;
  fallbackMaxChars: number;
}

/** Cleans, filters through the plausibility check, dedupes and scores raw matches. */
export function acceptCandidates(
  stage: ExtractionStage,
  rawMatches: readonly string[],
  ctx: ExtractionContext
): CandidateSet | null {
  const seen = new Set<string>();
  const accepted: string[] = [];
  for (const raw of rawMatches) {
    const cleaned = ctx.clean(raw);
    const key = cleaned.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    if (ctx.classifier.isPlausibleAnswer(cleaned)) accepted.push(cleaned);
  }
  if (!accepted.length) return null;
  return { stage, candidates: ctx.scorer.scoreAll(accepted) };
}
