import { CandidateSet } from "./CandidateSet";
import { ExtractionStage } from "./ExtractionStage";

export interface ExtractionOutcome {
  readonly extractedText: string;
  readonly stageUsed: ExtractionStage;
}

export interface StageTrace {
  stage: ExtractionStage;
  result: CandidateSet | null;
}

export interface ExtractionTrace {
  outcome: ExtractionOutcome;
  stages: StageTrace[];
}
