import { ResultRecordZod, Sample, normalizeIdiom, toSample } from "@rebus-eval/core";
import { IdiomExtractor } from "../extraction/extractIdiom";
import { ExtractionStage } from "../extraction/types/ExtractionStage";
import { tokenF1 } from "./tokenF1";
import { EvaluationResult, MetricsReport, SampleEvaluation, SkippedRecord } from "./types";

export interface EvaluateOptions {
  extractor?: IdiomExtractor;
  /** When false the raw response is scored as-is. */
  useExtraction?: boolean;
  /** How many helped/hurt rows to keep for review. */
  reviewExamples?: number;
}

/** One normalized phrase contains the other; an empty phrase is contained in any. */
export function isPartialMatch(extracted: string, truth: string): boolean {
  return extracted.includes(truth) || truth.includes(extracted);
}

export function evaluateSample(
  sample: Sample,
  index: number,
  extractor: IdiomExtractor,
  useExtraction = true
): SampleEvaluation {
  const outcome = useExtraction ? extractor.extract(sample.rawPrediction) : null;
  const extracted = outcome ? outcome.extractedText : sample.rawPrediction;

  const normalizedTruth = normalizeIdiom(sample.groundTruth);
  const normalizedRaw = normalizeIdiom(sample.rawPrediction);
  const normalizedExtracted = normalizeIdiom(extracted);

  const exactMatch = normalizedExtracted === normalizedTruth;
  const rawMatch = normalizedRaw === normalizedTruth;

  return {
    index,
    id: sample.id,
    groundTruth: sample.groundTruth,
    rawPrediction: sample.rawPrediction,
    extracted,
    stage: outcome ? outcome.stageUsed : null,
    normalizedTruth,
    normalizedRaw,
    normalizedExtracted,
    exactMatch,
    partialMatch: isPartialMatch(normalizedExtracted, normalizedTruth),
    rawMatch,
    f1: tokenF1(normalizedExtracted, normalizedTruth),
    extractionHelped: exactMatch && !rawMatch,
    extractionHurt: rawMatch && !exactMatch,
  };
}

function emptyStageCounts(): Record<ExtractionStage, number> {
  return {
    [ExtractionStage.BRACKET_MARKER]: 0,
    [ExtractionStage.QUOTED]: 0,
    [ExtractionStage.KEYWORD_INTRO]: 0,
    [ExtractionStage.STANDALONE_LINE]: 0,
    [ExtractionStage.FIRST_SENTENCE]: 0,
    [ExtractionStage.NGRAM_SCAN]: 0,
    [ExtractionStage.FALLBACK_RAW]: 0,
  };
}

function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

export function buildReport(details: readonly SampleEvaluation[], totalSamples: number): MetricsReport {
  const evaluated = details.length;
  const sums = details.reduce(
    (acc, d) => ({
      exact: acc.exact + (d.exactMatch ? 1 : 0),
      partial: acc.partial + (d.partialMatch ? 1 : 0),
      raw: acc.raw + (d.rawMatch ? 1 : 0),
      f1: acc.f1 + d.f1,
      helped: acc.helped + (d.extractionHelped ? 1 : 0),
      hurt: acc.hurt + (d.extractionHurt ? 1 : 0),
    }),
    { exact: 0, partial: 0, raw: 0, f1: 0, helped: 0, hurt: 0 }
  );

  const stageCounts = emptyStageCounts();
  for (const d of details) {
    if (d.stage) stageCounts[d.stage]++;
  }

  return Object.freeze({
    totalSamples,
    evaluatedSamples: evaluated,
    skippedSamples: totalSamples - evaluated,
    exactMatchCount: sums.exact,
    exactMatchRate: rate(sums.exact, evaluated),
    partialMatchCount: sums.partial,
    partialMatchRate: rate(sums.partial, evaluated),
    macroF1: rate(sums.f1, evaluated),
    rawExactMatchCount: sums.raw,
    rawExactMatchRate: rate(sums.raw, evaluated),
    extractionImpact: Object.freeze({ helped: sums.helped, hurt: sums.hurt }),
    stageCounts: Object.freeze(stageCounts),
  });
}

function describeIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/**
 * Scores a batch of result records. Records that fail validation are counted as
 * skipped and left out of every rate; nothing in here throws on bad data.
 */
export function evaluateSamples(records: readonly unknown[], opts: EvaluateOptions = {}): EvaluationResult {
  const extractor = opts.extractor ?? new IdiomExtractor();
  const useExtraction = opts.useExtraction ?? true;
  const reviewExamples = opts.reviewExamples ?? 5;

  const details: SampleEvaluation[] = [];
  const skipped: SkippedRecord[] = [];

  records.forEach((record, index) => {
    const parsed = ResultRecordZod.safeParse(record);
    if (!parsed.success) {
      skipped.push({ index, reason: describeIssues(parsed.error) });
      return;
    }
    details.push(evaluateSample(toSample(parsed.data, index), index, extractor, useExtraction));
  });

  return {
    report: buildReport(details, records.length),
    details,
    skipped,
    examples: {
      helped: details.filter((d) => d.extractionHelped).slice(0, reviewExamples),
      hurt: details.filter((d) => d.extractionHurt).slice(0, reviewExamples),
    },
  };
}
