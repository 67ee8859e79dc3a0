import minimist from "minimist";
import path from "path";
import { createLogger, getConfig } from "@rebus-eval/core";
import { evaluateSamples } from "../../evaluation/evaluateSamples";
import { IdiomExtractor } from "../../extraction/extractIdiom";
import { toMetricsJson } from "../../evaluation/metricsJson";
import { renderReport, renderSampleDetail } from "../../evaluation/renderReport";
import { isReviewMode, selectForReview } from "../../evaluation/reviewSelection";
import { DEBUG_FILE, loadResults, resolveRunTimestamp, runDir, writeJson } from "../../results/loadResults";

export async function debugExtractionCommand(args: string[] = process.argv.slice(3)) {
  const config = getConfig();
  const argv = minimist(args, {
    string: ["timestamp", "logs-dir", "show"],
    boolean: ["save-debug"],
    alias: { t: "timestamp" },
    default: { show: "mixed", "max-samples": "10" },
  });
  const timestamp: string | undefined = argv.timestamp;
  const show: string = argv.show;
  if (!timestamp || !isReviewMode(show)) {
    throw new Error("Usage: debug-extraction --timestamp <ts|latest> [--show mixed|all|helped|hurt] [--max-samples 10] [--save-debug]");
  }
  const maxSamples = parseInt(String(argv["max-samples"]), 10) || 10;
  const logsDir: string = argv["logs-dir"] || config.evaluation.logsDir;
  const logger = createLogger(config, { name: "debug-extraction", toStderr: true });

  const resolved = await resolveRunTimestamp(logsDir, timestamp);
  const records = await loadResults(logsDir, resolved);
  logger.info({ timestamp: resolved, records: records.length }, "Loaded results");

  const extractor = new IdiomExtractor({ fallbackMaxChars: config.extraction.fallbackMaxChars });
  const result = evaluateSamples(records, { extractor });
  console.log(renderReport(result.report, "Extraction debugging summary"));
  console.log("");
  for (const d of selectForReview(result.details, show, maxSamples)) {
    console.log(renderSampleDetail(d));
    console.log("");
  }

  if (argv["save-debug"]) {
    const out = path.join(runDir(logsDir, resolved), DEBUG_FILE);
    await writeJson(out, {
      analysis: toMetricsJson(result.report, config.evaluation.precision),
      skipped: result.skipped,
      sample_details: result.details,
    });
    logger.info({ out }, "Debug details saved");
  }
}
