import { countWords } from "@rebus-eval/core";
import { CandidateClassifier } from "./CandidateClassifier";
import { ScoredCandidate } from "./types/CandidateSet";

export interface RubricRule {
  name: string;
  weight: number;
  applies: (candidate: string, classifier: CandidateClassifier) => boolean;
}

const ARTICLE_RE = /(?<![\p{L}\p{N}_])(?:a|an|the)(?![\p{L}\p{N}_])/iu;

export const SCORING_RUBRIC: readonly RubricRule[] = Object.freeze([
  {
    name: "idiomLength",
    weight: 10,
    applies: (c: string) => {
      const words = countWords(c);
      return words >= 3 && words <= 6;
    },
  },
  { name: "compact", weight: 5, applies: (c: string) => countWords(c) <= 8 },
  { name: "notDescription", weight: 5, applies: (c: string, classifier: CandidateClassifier) => !classifier.isDescription(c) },
  { name: "hasArticle", weight: 2, applies: (c: string) => ARTICLE_RE.test(c) },
]);

export class CandidateScorer {
  constructor(
    private readonly classifier: CandidateClassifier = new CandidateClassifier(),
    private readonly rubric: readonly RubricRule[] = SCORING_RUBRIC
  ) {}

  score(candidate: string): number {
    return this.rubric.reduce((sum, rule) => (rule.applies(candidate, this.classifier) ? sum + rule.weight : sum), 0);
  }

  scoreAll(candidates: readonly string[]): ScoredCandidate[] {
    return candidates.map((text) => ({ text, score: this.score(text) }));
  }

  /** Highest total wins; on a tie the earlier candidate is kept. */
  pickBest(scored: readonly ScoredCandidate[]): ScoredCandidate | null {
    let best: ScoredCandidate | null = null;
    for (const candidate of scored) {
      if (!best || candidate.score > best.score) best = candidate;
    }
    return best;
  }

  selectBest(candidates: readonly string[]): string {
    if (!candidates.length) return "";
    if (candidates.length === 1) return candidates[0];
    return this.pickBest(this.scoreAll(candidates))?.text ?? "";
  }
}
