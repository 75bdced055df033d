// ──────────────────────────────────────────────
// JobPulse - Execution Types
// ──────────────────────────────────────────────

import type { StateFields, WorkflowState } from "./workflow.js";
import type { RetrievalQuery } from "./retrieval.js";

export type RunStatus = "completed" | "failed";
export type TerminalState = "END" | "ERROR";
export type StepStatus = "completed" | "failed" | "skipped" | "cancelled";

export type EngineErrorCode =
  | "STAGE_FAILURE"
  | "NO_VIABLE_TRANSITION"
  | "RUNAWAY_WORKFLOW"
  | "DUPLICATE_ID"
  | "CHECKPOINT_FAILURE"
  | "CANCELLED";

export interface StageAttemptSummary {
  attempt: number;
  status: "completed" | "retry" | "failed";
  durationMs: number;
  reason: string | null;
}

export interface StageStepResult {
  stage: string;
  status: StepStatus;
  attempts: StageAttemptSummary[];
  attemptCount: number;
  query: RetrievalQuery | null;
  documentsRetrieved: number;
  documentsStored: number;
  durationMs: number;
  error: string | null;
}

export interface WorkflowRunResult<F extends StateFields> {
  runId: string;
  workflow: string;
  status: RunStatus;
  terminal: TerminalState;
  state: WorkflowState<F>;
  steps: StageStepResult[];
  invocationCount: number;
  failedStage: string | null;
  errorCode: EngineErrorCode | null;
  errorMessage: string | null;
  resumedFrom: string | null;
  checkpointSaved: boolean;
  totalDurationMs: number;
}

export interface CheckpointRecord {
  version: 1;
  workflow: string;
  savedAt: string;
  lastCompletedStage: string | null;
  state: {
    fields: Record<string, unknown>;
    error: string | null;
    control: { forceRestart: boolean };
  };
}

export interface CheckpointStore {
  load(key: string): Promise<CheckpointRecord | null>;
  save(key: string, record: CheckpointRecord): Promise<void>;
  clear(key: string): Promise<void>;
}

export interface CheckpointEvent {
  workflow: string;
  stage: string | null;
  reason: "commit" | "error" | "final";
  record: CheckpointRecord;
}
