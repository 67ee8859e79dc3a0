import { ExtractionStage } from "../extraction/types/ExtractionStage";

export interface ExtractionImpact {
  helped: number;
  hurt: number;
}

export interface MetricsReport {
  readonly totalSamples: number;
  readonly evaluatedSamples: number;
  readonly skippedSamples: number;
  readonly exactMatchCount: number;
  readonly exactMatchRate: number;
  readonly partialMatchCount: number;
  readonly partialMatchRate: number;
  readonly macroF1: number;
  /** Baseline: the unextracted response compared directly. */
  readonly rawExactMatchCount: number;
  readonly rawExactMatchRate: number;
  readonly extractionImpact: Readonly<ExtractionImpact>;
  readonly stageCounts: Readonly<Record<ExtractionStage, number>>;
}

export interface SampleEvaluation {
  index: number;
  id: string;
  groundTruth: string;
  rawPrediction: string;
  extracted: string;
  /** null when extraction was switched off. */
  stage: ExtractionStage | null;
  normalizedTruth: string;
  normalizedRaw: string;
  normalizedExtracted: string;
  exactMatch: boolean;
  partialMatch: boolean;
  rawMatch: boolean;
  f1: number;
  extractionHelped: boolean;
  extractionHurt: boolean;
}

export interface SkippedRecord {
  index: number;
  reason: string;
}

export interface EvaluationResult {
  report: MetricsReport;
  details: SampleEvaluation[];
  skipped: SkippedRecord[];
  examples: { helped: SampleEvaluation[]; hurt: SampleEvaluation[] };
}
