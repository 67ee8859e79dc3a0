import { ExtractionStage } from "./ExtractionStage";

export interface ScoredCandidate {
  text: string;
  score: number;
}

/** Candidates produced by one stage for one response, in order of appearance. */
export interface CandidateSet {
  stage: ExtractionStage;
  candidates: ScoredCandidate[];
}
