import pino from "pino";
import type { Config } from "./config";

export interface LoggerOptions {
  /** Shown as `name` on every line, e.g. the CLI command. */
  name?: string;
  /** Write to stderr so stdout stays clean for JSON reports. */
  toStderr?: boolean;
}

export function createLogger(config: Pick<Config, "log">, opts: LoggerOptions = {}) {
  const isDev = process.env.NODE_ENV !== "production";
  const destination = opts.toStderr ? 2 : 1;

  if (isDev) {
    return pino({
      name: opts.name,
      level: config.log.level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination,
        },
      },
    });
  }

  return pino({ name: opts.name, level: config.log.level }, pino.destination(destination));
}

export type Logger = ReturnType<typeof createLogger>;
