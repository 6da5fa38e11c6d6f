/**
 * WinProv Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every engine operation logs through
 * this module.
 *
 * Silent by default so scripted callers only see command output. With
 * --debug the CLI raises the level and records go to stderr as JSON.
 *
 * Credentials never reach a log record: the redact paths below cover
 * every field name the engine uses for the API key and passwords.
 */

import pino from "pino";

export interface LoggerOptions {
  level: "silent" | "debug" | "info" | "warn" | "error";
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export const REDACTED_PATHS = [
  "credential",
  "apiKey",
  "explicitCredential",
  "password",
  'headers["X-JFrog-Art-Api"]',
  "*.credential",
  "*.apiKey",
];

export function createLogger(
  options: Partial<LoggerOptions> = {},
  destination: pino.DestinationStream = pino.destination({ fd: 2, sync: true }),
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      redact: { paths: REDACTED_PATHS, censor: "[REDACTED]" },
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

export type Logger = pino.Logger;
