// src/observability/logger.ts
// Structured JSON logging
//
// Configures Pino with:
// - Environment-based log levels
// - JSON output by default, pretty printing when LOG_PRETTY=true
// - Module-scoped loggers, plus per-document loggers carrying documentId and runId

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/* ---------- Configuration ---------- */

/**
 * Get the configured log level from environment
 * Defaults to 'info'
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return VALID_LEVELS.find((l) => l === level) ?? "info";
}

/**
 * Check if pretty printing is enabled (for development)
 */
export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

// Root logger instance (singleton)
let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "lexrecon",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      });
    } else {
      rootLogger = pino(options);
    }
  }

  return rootLogger;
}

/**
 * Create a logger instance, optionally scoped to a module
 *
 * @example
 * const log = createLogger('merge/resultMerger');
 * log.warn({ documentId, reason }, 'Dropped malformed candidate');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();

  if (moduleName) {
    return root.child({ module: moduleName });
  }

  return root;
}

/** Bindings every per-document log line carries */
export interface DocumentLogContext {
  documentId: string;
  runId: string;
}

/**
 * Logger for one document of a run
 *
 * @example
 * const docLog = createDocumentLogger(log, { documentId: 'doc-1', runId });
 */
export function createDocumentLogger(parent: Logger, context: DocumentLogContext): Logger {
  return parent.child({ documentId: context.documentId, runId: context.runId });
}

export type { Logger };
