// ──────────────────────────────────────────────
// JobPulse - Stage Result Helpers
// ──────────────────────────────────────────────

import type { NewDocument, StageResult, StateFields } from "@jobpulse/types";

export function succeed<F extends StateFields>(output: Partial<F>, documents?: NewDocument[]): StageResult<F> {
  return documents && documents.length > 0
    ? { status: "success", output, documents }
    : { status: "success", output };
}

export function retry<F extends StateFields>(detail: string): StageResult<F> {
  return { status: "retryable", output: {}, errorDetail: detail };
}

export function fail<F extends StateFields>(detail: string): StageResult<F> {
  return { status: "fatal", output: {}, errorDetail: detail };
}
