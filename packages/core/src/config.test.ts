import assert from "assert";
import { afterEach, test } from "node:test";
import { getConfig, resetConfigCache } from "./config";

const KEYS = [
  "LOG_LEVEL",
  "REBUS_LOGS_DIR",
  "REBUS_USE_EXTRACTION",
  "REBUS_REVIEW_EXAMPLES",
  "REBUS_METRICS_PRECISION",
  "REBUS_FALLBACK_MAX_CHARS",
];

const saved: Record<string, string | undefined> = {};
for (const key of KEYS) saved[key] = process.env[key];

function clearEnv() {
  for (const key of KEYS) delete process.env[key];
  resetConfigCache();
}

afterEach(() => {
  for (const key of KEYS) {
    if (saved[key] === undefined) delete process.env[key];
    else process.env[key] = saved[key];
  }
  resetConfigCache();
});

function testDefaults() {
  clearEnv();
  const config = getConfig();
  assert.strictEqual(config.log.level, "info");
  assert.strictEqual(config.evaluation.logsDir, "logs");
  assert.strictEqual(config.evaluation.useExtraction, true);
  assert.strictEqual(config.evaluation.reviewExamples, 5);
  assert.strictEqual(config.evaluation.precision, 4);
  assert.strictEqual(config.extraction.fallbackMaxChars, 50);
}

function testOverrides() {
  clearEnv();
  process.env.LOG_LEVEL = "debug";
  process.env.REBUS_LOGS_DIR = "runs";
  process.env.REBUS_USE_EXTRACTION = "false";
  process.env.REBUS_FALLBACK_MAX_CHARS = "80";
  const config = getConfig();
  assert.strictEqual(config.log.level, "debug");
  assert.strictEqual(config.evaluation.logsDir, "runs");
  assert.strictEqual(config.evaluation.useExtraction, false);
  assert.strictEqual(config.extraction.fallbackMaxChars, 80);
}

function testInvalidValue() {
  clearEnv();
  process.env.LOG_LEVEL = "loud";
  assert.throws(() => getConfig(), /Configuration error:\nlog\.level/);
}

test("getConfig applies defaults", testDefaults);
test("getConfig reads environment overrides", testOverrides);
test("getConfig reports invalid values by path", testInvalidValue);
