import assert from "assert";
import { test } from "node:test";
import { evaluateSamples } from "../src/evaluation/evaluateSamples";
import {
  renderComparison,
  renderReport,
  renderReviewExamples,
  renderSampleDetail,
} from "../src/evaluation/renderReport";
import { isReviewMode, selectForReview } from "../src/evaluation/reviewSelection";

const RECORDS = [
  { image_id: "helped", ground_truth: "break the ice", prediction: "The answer is {{{break the ice}}}" },
  {
    image_id: "hurt",
    ground_truth: "The answer is blowing in the wind",
    prediction: "The answer is blowing in the wind",
  },
  { image_id: "same", ground_truth: "kick the bucket", prediction: "completely unrelated text" },
];

const withExtraction = evaluateSamples(RECORDS);
const withoutExtraction = evaluateSamples(RECORDS, { useExtraction: false });

function testReportLines() {
  const lines = renderReport(withExtraction.report, "Run 20250301_000000").split("\n");
  assert.strictEqual(lines[1], "Run 20250301_000000");
  assert.ok(lines.includes("Samples: 3/3 evaluated (0 skipped)"));
  assert.ok(lines.includes("Exact match:   1 (0.3333)"));
  assert.ok(lines.includes("Partial match: 2 (0.6667)"));
  assert.ok(lines.includes("Macro F1:      0.6000"));
  assert.ok(lines.includes("Extraction helped 1, hurt 1 (net +0)"));
  assert.ok(lines.includes("  BRACKET_MARKER  1 (33.3%)"));
  assert.ok(lines.includes("  KEYWORD_INTRO   1 (33.3%)"));
  assert.ok(lines.includes("  STANDALONE_LINE 1 (33.3%)"));
  assert.ok(!lines.some((l) => l.includes("FALLBACK_RAW")));
}

function testComparison() {
  const lines = renderComparison(withExtraction.report, withoutExtraction.report).split("\n");
  assert.strictEqual(lines[0], "Metric                No extract  Extract     Diff");
  assert.strictEqual(lines[2], "Exact match rate      0.3333      0.3333      +0.0000");
}

function testSampleDetail() {
  const text = renderSampleDetail(withExtraction.details[0]);
  const lines = text.split("\n");
  assert.strictEqual(lines[0], "--- Sample 0 (helped) ---");
  assert.strictEqual(lines[3], "Extracted:    break the ice [BRACKET_MARKER]");
  assert.strictEqual(lines[5], "Exact yes | partial yes | F1 1.00 | ✅ extraction helped");
  assert.strictEqual(
    renderSampleDetail(withoutExtraction.details[2]).split("\n")[3],
    "Extracted:    completely unrelated text [off]"
  );
}

function testReviewExamples() {
  const lines = renderReviewExamples(withExtraction.examples).split("\n");
  assert.strictEqual(lines[0], "EXTRACTION HELPED:");
  assert.strictEqual(lines[2], "--- Sample 0 (helped) ---");
  assert.strictEqual(lines[9], "EXTRACTION HURT:");
  assert.strictEqual(lines[11], "--- Sample 1 (hurt) ---");
  assert.strictEqual(lines.length, 17);
  assert.strictEqual(renderReviewExamples({ helped: [], hurt: [] }), "");
  assert.strictEqual(renderReviewExamples(withoutExtraction.examples), "");
}

function testReviewSelection() {
  const details = withExtraction.details;
  assert.strictEqual(isReviewMode("mixed"), true);
  assert.strictEqual(isReviewMode("bogus"), false);
  assert.deepStrictEqual(selectForReview(details, "mixed", 10).map((d) => d.id), ["helped", "hurt", "same"]);
  assert.deepStrictEqual(selectForReview(details, "hurt", 10).map((d) => d.id), ["hurt"]);
  assert.deepStrictEqual(selectForReview(details, "helped", 10).map((d) => d.id), ["helped"]);
  assert.deepStrictEqual(selectForReview(details, "all", 2).map((d) => d.id), ["helped", "hurt"]);
}

test("report lists headline metrics and stages used", testReportLines);
test("comparison table lines up both runs", testComparison);
test("sample detail shows extraction and verdict", testSampleDetail);
test("review examples list helped then hurt rows", testReviewExamples);
test("review selection filters by mode", testReviewSelection);
