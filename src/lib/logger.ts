import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger } from "pino";

/** Credential fields that must never reach log output. */
export const REDACTED_PATHS = [
  "apiKey",
  "*.apiKey",
  "githubToken",
  "*.githubToken",
  "headers.authorization",
  "*.headers.authorization",
];

export type LoggerOptions = {
  level?: string;
  /** Defaults to stdout. Tests pass an in-memory stream. */
  destination?: DestinationStream;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const config = {
    level,
    base: { service: "issue-duplicate-finder" },
    redact: { paths: REDACTED_PATHS, censor: "[Redacted]" },
  };
  // JSON lines only; no transports or pretty-printing
  return options.destination ? pino(config, options.destination) : pino(config);
}

/** Per-request logger carrying the request id and route on every line. */
export function createChildLogger(
  logger: Logger,
  context: { requestId: string; route: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
