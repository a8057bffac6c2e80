/**
 * Structured logging on pino.
 *
 * Configuration:
 *   POKEPIPELINE_LOG_LEVEL  minimum level (default "info", "silent" under Vitest)
 *   POKEPIPELINE_LOG_PRETTY "true" pretty-prints through pino-pretty
 *
 * Log lines go to stderr; stdout is reserved for the command's JSON output.
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.http.warn({ url, attempt }, "retrying request");
 */

import pino from "pino";
import type { Logger } from "pino";

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.POKEPIPELINE_LOG_LEVEL) return env.POKEPIPELINE_LOG_LEVEL;
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  return isTest ? "silent" : "info";
}

function wantsPretty(): boolean {
  return !IS_TEST && process.env.POKEPIPELINE_LOG_PRETTY === "true";
}

function createRootLogger(): Logger {
  const options: pino.LoggerOptions = {
    level: resolveLevel(),
    base: { service: "pokepipeline" },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (wantsPretty()) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,service"
        }
      }
    });
  }

  return pino(options, pino.destination(2));
}

export const rootLogger: Logger = createRootLogger();

/**
 * Subsystem loggers. Each adds a `subsystem` field to every line.
 */
export const log = {
  /** HTTP fetches and retries */
  http: rootLogger.child({ subsystem: "http" }),
  /** Pipeline stages */
  etl: rootLogger.child({ subsystem: "etl" }),
  /** Schema and writes */
  db: rootLogger.child({ subsystem: "db" }),
  /** Command-line entry */
  cli: rootLogger.child({ subsystem: "cli" }),
  root: rootLogger
};

export type { Logger };
