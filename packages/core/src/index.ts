export { getConfig, resetConfigCache } from "./config";
export type { Config } from "./config";
export { createLogger } from "./log";
export type { Logger, LoggerOptions } from "./log";
export { normalizeIdiom, tokenize, countWords } from "./text";
export { ResultRecordZod, toSample } from "./types";
export type { ResultRecord, Sample } from "./types";
