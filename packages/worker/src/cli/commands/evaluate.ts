import minimist from "minimist";
import path from "path";
import { Logger, createLogger, getConfig } from "@rebus-eval/core";
import { evaluateSamples } from "../../evaluation/evaluateSamples";
import { MetricsJson, toMetricsJson } from "../../evaluation/metricsJson";
import { renderReport, renderReviewExamples } from "../../evaluation/renderReport";
import { EvaluationResult } from "../../evaluation/types";
import { IdiomExtractor } from "../../extraction/extractIdiom";
import { METRICS_FILE, loadResults, resolveRunTimestamp, runDir, writeJson } from "../../results/loadResults";

export interface EvaluateRunOptions {
  logsDir: string;
  timestamp: string;
  useExtraction: boolean;
  precision: number;
  reviewExamples: number;
  outPath?: string;
  extractor?: IdiomExtractor;
  logger?: Logger;
}

export interface EvaluateRunResult {
  timestamp: string;
  metricsPath: string;
  metrics: MetricsJson;
  result: EvaluationResult;
}

export async function runEvaluation(opts: EvaluateRunOptions): Promise<EvaluateRunResult> {
  const { logger } = opts;
  const timestamp = await resolveRunTimestamp(opts.logsDir, opts.timestamp);
  const records = await loadResults(opts.logsDir, timestamp);
  logger?.info({ timestamp, records: records.length, useExtraction: opts.useExtraction }, "Evaluating run");

  const result = evaluateSamples(records, {
    extractor: opts.extractor,
    useExtraction: opts.useExtraction,
    reviewExamples: opts.reviewExamples,
  });
  for (const s of result.skipped) {
    logger?.warn({ index: s.index, reason: s.reason }, "Skipped malformed record");
  }

  const metrics = toMetricsJson(result.report, opts.precision);
  const metricsPath = opts.outPath || path.join(runDir(opts.logsDir, timestamp), METRICS_FILE);
  await writeJson(metricsPath, metrics);
  logger?.info({ metricsPath }, "Metrics written");

  return { timestamp, metricsPath, metrics, result };
}

export async function evaluateCommand(args: string[] = process.argv.slice(3)) {
  const config = getConfig();
  const argv = minimist(args, {
    string: ["timestamp", "logs-dir", "out"],
    boolean: ["extraction"],
    alias: { t: "timestamp", o: "out" },
    default: { extraction: config.evaluation.useExtraction },
  });
  const timestamp: string | undefined = argv.timestamp;
  if (!timestamp) {
    throw new Error("Usage: evaluate --timestamp <YYYYMMDD_HHMMSS|latest> [--logs-dir logs] [--no-extraction] [--out file]");
  }

  const logger = createLogger(config, { name: "evaluate", toStderr: true });
  const run = await runEvaluation({
    logsDir: argv["logs-dir"] || config.evaluation.logsDir,
    timestamp,
    useExtraction: Boolean(argv.extraction),
    precision: config.evaluation.precision,
    reviewExamples: config.evaluation.reviewExamples,
    outPath: argv.out,
    extractor: new IdiomExtractor({ fallbackMaxChars: config.extraction.fallbackMaxChars }),
    logger,
  });

  console.log(renderReport(run.result.report, `Results for run ${run.timestamp}`));
  const review = renderReviewExamples(run.result.examples);
  if (review) {
    console.log("");
    console.log(review);
  }
  console.log(`Metrics written to ${run.metricsPath}`);
}
