// src/observability/logger.ts
// pino loggers for the analysis service.
//
// Every line carries service, version and env. Contract text and provider
// credentials are censored at any of the paths in REDACT_PATHS, so a stray
// `log.info({ text })` cannot leak a contract. LOG_LEVEL=silent (set by
// the vitest config) turns output off entirely.

import pino, { type DestinationStream, type Logger } from "pino";

export type LogLevel = pino.LevelWithSilent;

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export const REDACT_PATHS: readonly string[] = [
  "text",
  "fullText",
  "*.text",
  "*.fullText",
  "apiKey",
  "*.apiKey",
  "req.headers.authorization",
  'req.headers["x-api-key"]',
];

export const REDACTED = "[redacted]";

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS.find((l) => l === level) ?? "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

export interface LoggerSettings {
  level: LogLevel;
  pretty: boolean;
}

/** Options for the root logger; pretty output goes through a pino-pretty transport. */
export function buildLoggerOptions(settings: LoggerSettings): pino.LoggerOptions {
  const options: pino.LoggerOptions = {
    level: settings.level,
    base: {
      service: "contract-sentinel",
      version: process.env.npm_package_version || "unknown",
      env: process.env.NODE_ENV || "development",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: [...REDACT_PATHS], censor: REDACTED },
  };
  if (!settings.pretty) return options;

  return {
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname,service,version" },
    },
  };
}

/**
 * Root logger from LOG_LEVEL and LOG_PRETTY. A destination is for tests
 * that read the output; it cannot be combined with pretty printing.
 */
export function createRootLogger(destination?: DestinationStream): Logger {
  const settings: LoggerSettings = {
    level: getLogLevel(),
    pretty: destination ? false : isPrettyEnabled(),
  };
  const options = buildLoggerOptions(settings);
  return destination ? pino(options, destination) : pino(options);
}

let rootLogger: Logger | undefined;

/**
 * Module-scoped logger; the module name is bound as `module`.
 *
 * @example
 * const log = createLogger('analysis/risk');
 * log.info({ stage, score }, 'Risk assessed');
 */
export function createLogger(moduleName?: string): Logger {
  if (!rootLogger) rootLogger = createRootLogger();
  return moduleName ? rootLogger.child({ module: moduleName }) : rootLogger;
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
