import fs from "fs/promises";
import path from "path";
import { getConfig } from "@rebus-eval/core";
import { evaluateSamples } from "../../evaluation/evaluateSamples";
import { renderComparison, renderSampleDetail } from "../../evaluation/renderReport";
import { IdiomExtractor } from "../../extraction/extractIdiom";

export const SAMPLE_RESULTS_PATH = path.resolve(__dirname, "../../../eval/sample-results.json");

export async function loadSampleResults(file: string = SAMPLE_RESULTS_PATH): Promise<unknown[]> {
  const parsed: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  if (!Array.isArray(parsed)) throw new Error(`${file} must contain a JSON array`);
  return parsed;
}

export async function quickTestCommand() {
  const config = getConfig();
  const records = await loadSampleResults();
  console.log(`Testing with ${records.length} sample predictions...`);

  const extractor = new IdiomExtractor({ fallbackMaxChars: config.extraction.fallbackMaxChars });
  const withExtraction = evaluateSamples(records, { extractor });
  const withoutExtraction = evaluateSamples(records, { useExtraction: false });

  console.log(renderComparison(withExtraction.report, withoutExtraction.report));
  console.log("");
  for (const d of withExtraction.details) {
    console.log(renderSampleDetail(d));
    console.log("");
  }
}
