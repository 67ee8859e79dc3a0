import fs from "fs/promises";
import path from "path";

export const RESULTS_FILE = "results.json";
export const METRICS_FILE = "metrics.json";
export const DEBUG_FILE = "debug_extraction.json";

export function runDir(logsDir: string, timestamp: string): string {
  return path.join(logsDir, timestamp);
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * `latest` picks the newest run directory that has a results file; run
 * directories are named by timestamp so lexical order is chronological.
 */
export async function resolveRunTimestamp(logsDir: string, value: string): Promise<string> {
  if (value !== "latest") return value;
  const entries = await fs.readdir(logsDir, { withFileTypes: true });
  const runs = entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort()
    .reverse();
  for (const name of runs) {
    if (await exists(path.join(logsDir, name, RESULTS_FILE))) return name;
  }
  throw new Error(`No run with ${RESULTS_FILE} under ${logsDir}`);
}

/** Records are returned unvalidated; the evaluator decides what is usable. */
export async function loadResults(logsDir: string, timestamp: string): Promise<unknown[]> {
  const file = path.join(runDir(logsDir, timestamp), RESULTS_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    throw new Error(`No ${RESULTS_FILE} at ${file}`, { cause: error });
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`${file} must contain a JSON array of results`);
  }
  return parsed;
}

export async function writeJson(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, `${JSON.stringify(data, null, 2)}\n`, "utf8");
}
