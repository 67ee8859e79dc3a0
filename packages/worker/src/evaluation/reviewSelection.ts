import { SampleEvaluation } from "./types";

export type ReviewMode = "mixed" | "all" | "helped" | "hurt";

export const REVIEW_MODES: readonly ReviewMode[] = ["mixed", "all", "helped", "hurt"];

export function isReviewMode(value: string): value is ReviewMode {
  return REVIEW_MODES.some((m) => m === value);
}

/** Rows to print for a human; `mixed` shows up to 3 helped, 3 hurt and 4 unchanged. */
export function selectForReview(details: readonly SampleEvaluation[], mode: ReviewMode, max: number): SampleEvaluation[] {
  switch (mode) {
    case "all":
      return details.slice(0, max);
    case "helped":
      return details.filter((d) => d.extractionHelped).slice(0, max);
    case "hurt":
      return details.filter((d) => d.extractionHurt).slice(0, max);
    case "mixed": {
      const helped = details.filter((d) => d.extractionHelped).slice(0, 3);
      const hurt = details.filter((d) => d.extractionHurt).slice(0, 3);
      const unchanged = details.filter((d) => !d.extractionHelped && !d.extractionHurt).slice(0, 4);
      return [...helped, ...hurt, ...unchanged];
    }
  }
}
