/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs; pretty-printed in development.
 */

import { pino, type Logger } from "pino";
import type { LoadedConfig, LogLevel } from "./config.js";

/**
 * The log methods the finalizer calls. A pino logger satisfies it.
 */
export type FinalizerLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { module: "finalizer" },
    ...(options.pretty === true
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Logger options for a loaded config. Development output goes through
 * pino-pretty; every other environment logs JSON.
 */
export function loggerOptionsFromConfig(
  config: Pick<LoadedConfig, "logLevel" | "nodeEnv">,
): LoggerOptions {
  return {
    level: config.logLevel,
    pretty: config.nodeEnv === "development",
  };
}
