// ──────────────────────────────────────────────
// JobPulse - Utility Helpers
// ──────────────────────────────────────────────

import { randomUUID, createHash } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

export function contentId(prefix: string, text: string): string {
  const digest = createHash("sha256").update(text).digest("hex").slice(0, 16);
  return `${prefix}:${digest}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  if (baseDelayMs <= 0) return 0;
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);
}

export function safeJsonParse(text: string): { success: true; data: unknown } | { success: false; error: string } {
  try {
    return { success: true, data: JSON.parse(text) };
  } catch (err) {
    return { success: false, error: err instanceof Error ? err.message : "Invalid JSON" };
  }
}

// Models like to wrap JSON answers in ```json fences
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json|JSON)?\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced?.[1]?.trim() ?? trimmed;
}

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + "...";
}

export function measureDuration(startTime: bigint): number {
  const duration = process.hrtime.bigint() - startTime;
  return Number(duration / 1_000_000n);
}

export function startTimer(): bigint {
  return process.hrtime.bigint();
}

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return redactSecrets(error.message);
  }
  if (typeof error === "string") {
    return redactSecrets(error);
  }
  return "An unexpected error occurred";
}

export function redactSecrets(message: string): string {
  return message
    .replace(/key[=:]\s*["']?[a-zA-Z0-9_-]{20,}["']?/gi, "key=[REDACTED]")
    .replace(/api_key=[^&\s]+/gi, "api_key=[REDACTED]")
    .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readPathValue(source: unknown, path: string): unknown {
  const parts = path.split(".");
  let current: unknown = source;
  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}
