/**
 * Logger setup
 *
 * Structured Pino loggers with credential redaction, pretty-printing in
 * development and JSON lines everywhere else.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, REDACTED } from "./redact-paths.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export type LogLevel = "silent" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface CreateLoggerOptions {
  /** Defaults to "info", or "debug" when NODE_ENV is "development". */
  level?: LogLevel;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Write JSON lines here instead of stdout; disables the pretty transport. */
  destination?: pino.DestinationStream;
}

/**
 * Whether the current runtime environment is "development".
 */
function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * Build the Pino transport configuration.
 *
 * - In **development** output goes through `pino-pretty`.
 * - Otherwise lines are emitted as JSON and no transport is started.
 */
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger. Every call with no `destination` in
 * development starts its own pretty transport; components that only need a
 * fallback should use {@link getDefaultLogger}.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "recall-rerank";

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(loggerOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...loggerOptions, ...(transport ? { transport } : {}) });
}

let defaultLogger: Logger | undefined;

/**
 * Process-wide root logger, created on first use.
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}

/**
 * Child logger carrying component-scoped bindings (e.g. `component`, `collection`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
