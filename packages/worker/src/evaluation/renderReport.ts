import { STAGE_ORDER } from "../extraction/types/ExtractionStage";
import { EvaluationResult, MetricsReport, SampleEvaluation } from "./types";

function clip(text: string, max = 80): string {
  if (!text) return "";
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function renderReport(report: MetricsReport, title = "Rebus evaluation"): string {
  const lines: string[] = [];
  lines.push("=".repeat(50));
  lines.push(title);
  lines.push("=".repeat(50));
  lines.push(`Samples: ${report.evaluatedSamples}/${report.totalSamples} evaluated (${report.skippedSamples} skipped)`);
  lines.push(`Exact match:   ${report.exactMatchCount} (${report.exactMatchRate.toFixed(4)})`);
  lines.push(`Partial match: ${report.partialMatchCount} (${report.partialMatchRate.toFixed(4)})`);
  lines.push(`Macro F1:      ${report.macroF1.toFixed(4)}`);
  lines.push(`Raw baseline:  ${report.rawExactMatchCount} (${report.rawExactMatchRate.toFixed(4)})`);
  const { helped, hurt } = report.extractionImpact;
  const net = helped - hurt;
  lines.push(`Extraction helped ${helped}, hurt ${hurt} (net ${net >= 0 ? "+" : ""}${net})`);

  const used = STAGE_ORDER.filter((stage) => report.stageCounts[stage] > 0);
  if (used.length) {
    lines.push("");
    lines.push("STAGES:");
    for (const stage of used) {
      const count = report.stageCounts[stage];
      lines.push(`  ${stage.padEnd(16)}${count} (${pct(report.evaluatedSamples ? count / report.evaluatedSamples : 0)})`);
    }
  }
  return lines.join("\n");
}

export function renderComparison(withExtraction: MetricsReport, withoutExtraction: MetricsReport): string {
  const row = (label: string, off: number, on: number) => {
    const diff = on - off;
    return `${label.padEnd(22)}${off.toFixed(4).padEnd(12)}${on.toFixed(4).padEnd(12)}${diff >= 0 ? "+" : ""}${diff.toFixed(4)}`;
  };
  return [
    `${"Metric".padEnd(22)}${"No extract".padEnd(12)}${"Extract".padEnd(12)}Diff`,
    "-".repeat(56),
    row("Exact match rate", withoutExtraction.exactMatchRate, withExtraction.exactMatchRate),
    row("Partial match rate", withoutExtraction.partialMatchRate, withExtraction.partialMatchRate),
    row("Macro F1", withoutExtraction.macroF1, withExtraction.macroF1),
  ].join("\n");
}

export function renderSampleDetail(d: SampleEvaluation): string {
  const verdict = d.extractionHelped ? "✅ extraction helped" : d.extractionHurt ? "❌ extraction hurt" : "➖ no change";
  return [
    `--- Sample ${d.index} (${d.id}) ---`,
    `Ground truth: ${d.groundTruth}`,
    `Raw:          ${clip(d.rawPrediction, 120)}`,
    `Extracted:    ${d.extracted} [${d.stage ?? "off"}]`,
    `Normalized:   truth="${d.normalizedTruth}" raw="${clip(d.normalizedRaw, 60)}" extracted="${d.normalizedExtracted}"`,
    `Exact ${d.exactMatch ? "yes" : "no"} | partial ${d.partialMatch ? "yes" : "no"} | F1 ${d.f1.toFixed(2)} | ${verdict}`,
  ].join("\n");
}

/** Helped and hurt rows kept for review; empty when there are none. */
export function renderReviewExamples(examples: EvaluationResult["examples"]): string {
  const sections: string[] = [];
  if (examples.helped.length) {
    sections.push(["EXTRACTION HELPED:", ...examples.helped.map(renderSampleDetail)].join("\n\n"));
  }
  if (examples.hurt.length) {
    sections.push(["EXTRACTION HURT:", ...examples.hurt.map(renderSampleDetail)].join("\n\n"));
  }
  return sections.join("\n\n");
}
