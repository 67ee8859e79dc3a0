import { ExtractionStage } from "../extraction/types/ExtractionStage";
import { MetricsReport } from "./types";

export interface MetricsJson {
  total_samples: number;
  evaluated_samples: number;
  skipped_samples: number;
  exact_match_count: number;
  exact_match_rate: number;
  partial_match_count: number;
  partial_match_rate: number;
  macro_f1: number;
  raw_exact_match_count: number;
  raw_exact_match_rate: number;
  extraction_impact: { helped: number; hurt: number };
  stage_counts: Record<ExtractionStage, number>;
}

export function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/** Flat snake_case form persisted as metrics.json; floats rounded for stable diffs. */
export function toMetricsJson(report: MetricsReport, precision = 4): MetricsJson {
  return {
    total_samples: report.totalSamples,
    evaluated_samples: report.evaluatedSamples,
    skipped_samples: report.skippedSamples,
    exact_match_count: report.exactMatchCount,
    exact_match_rate: roundTo(report.exactMatchRate, precision),
    partial_match_count: report.partialMatchCount,
    partial_match_rate: roundTo(report.partialMatchRate, precision),
    macro_f1: roundTo(report.macroF1, precision),
    raw_exact_match_count: report.rawExactMatchCount,
    raw_exact_match_rate: roundTo(report.rawExactMatchRate, precision),
    extraction_impact: { helped: report.extractionImpact.helped, hurt: report.extractionImpact.hurt },
    stage_counts: { ...report.stageCounts },
  };
}
