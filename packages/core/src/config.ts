import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

// Load .env from monorepo root regardless of cwd
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}, z.boolean());

const ConfigSchema = z.object({
  log: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  }),
  evaluation: z.object({
    logsDir: z.string().min(1).default("logs"),
    useExtraction: booleanFromEnv.default(true),
    reviewExamples: z.coerce.number().int().min(0).default(5),
    precision: z.coerce.number().int().min(0).max(10).default(4),
  }),
  extraction: z.object({
    fallbackMaxChars: z.coerce.number().int().min(1).default(50),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = {
    log: {
      level: process.env.LOG_LEVEL || "info",
    },
    evaluation: {
      logsDir: process.env.REBUS_LOGS_DIR || undefined,
      useExtraction: process.env.REBUS_USE_EXTRACTION,
      reviewExamples: process.env.REBUS_REVIEW_EXAMPLES || undefined,
      precision: process.env.REBUS_METRICS_PRECISION || undefined,
    },
    extraction: {
      fallbackMaxChars: process.env.REBUS_FALLBACK_MAX_CHARS || undefined,
    },
  };

  try {
    cachedConfig = ConfigSchema.parse(raw);
    return cachedConfig;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
      throw new Error(`Configuration error:\n${messages}\n\nPlease check your .env file.`);
    }
    throw error;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
