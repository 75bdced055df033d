// ──────────────────────────────────────────────
// JobPulse - Structured Logger (Pino)
// ──────────────────────────────────────────────

import { pino, type Logger as PinoLogger } from "pino";
import { randomUUID } from "node:crypto";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

export const rootLogger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  redact: {
    paths: [
      "apiKey",
      "key",
      "authorization",
      "headers.authorization",
      "config.llm.apiKey",
      "config.serpapi.apiKey",
      "config.embedding.apiKey",
    ],
    censor: "[REDACTED]",
  },
});

export type Logger = PinoLogger;

export function createLogger(module: string, extra?: Record<string, unknown>): Logger {
  return rootLogger.child({ module, ...extra });
}

export function createCorrelationId(): string {
  return randomUUID();
}

export function createRunLogger(
  runId: string,
  workflow: string,
  correlationId: string
): Logger {
  return rootLogger.child({
    module: "engine",
    runId,
    workflow,
    correlationId,
  });
}
