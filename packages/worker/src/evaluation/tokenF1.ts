import { tokenize } from "@rebus-eval/core";

/**
 * Token-set F1 between two already normalized phrases. Duplicate tokens count
 * once; two empty phrases agree vacuously.
 */
export function tokenF1(predicted: string, truth: string): number {
  const predTokens = new Set(tokenize(predicted));
  const truthTokens = new Set(tokenize(truth));
  if (!predTokens.size && !truthTokens.size) return 1;
  if (!predTokens.size || !truthTokens.size) return 0;

  let shared = 0;
  for (const token of predTokens) {
    if (truthTokens.has(token)) shared++;
  }
  const precision = shared / predTokens.size;
  const recall = shared / truthTokens.size;
  if (precision + recall === 0) return 0;
  return (2 * precision * recall) / (precision + recall);
}
