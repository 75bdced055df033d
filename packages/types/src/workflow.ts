// ──────────────────────────────────────────────
// JobPulse - Workflow Types
// ──────────────────────────────────────────────

import type { Document, NewDocument, RetrievalMode } from "./retrieval.js";

export const START = "__start__";
export const END = "__end__";

export type EndSentinel = typeof END;

export type StateFields = Record<string, unknown>;

export type FieldName<F extends StateFields> = keyof F & string;

export interface ControlState {
  forceRestart: boolean;
}

export interface WorkflowState<F extends StateFields> {
  fields: Partial<F>;
  error: string | null;
  control: ControlState;
}

export type StageStatus = "success" | "retryable" | "fatal";

export interface StageResult<F extends StateFields> {
  status: StageStatus;
  output: Partial<F>;
  errorDetail?: string;
  documents?: NewDocument[];
}

export interface StageLogger {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
}

export interface StageContext {
  runId: string;
  workflow: string;
  stage: string;
  attempt: number;
  logger: StageLogger;
  signal: AbortSignal;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface StageRetrievalConfig {
  queryTemplate: string;
  mode: RetrievalMode;
  topK: number;
}

export interface StageDefinition<F extends StateFields> {
  name: string;
  owns: readonly FieldName<F>[];
  reads?: readonly FieldName<F>[];
  retrieval?: StageRetrievalConfig;
  retry?: Partial<RetryPolicy>;
  run: (
    state: WorkflowState<F>,
    documents: readonly Document[],
    context: StageContext
  ) => Promise<StageResult<F>>;
}

export type EdgeCondition<F extends StateFields> = (state: Readonly<WorkflowState<F>>) => boolean;

export interface TransitionEdge<F extends StateFields> {
  from: string;
  to: string;
  when?: EdgeCondition<F>;
  label?: string;
}

export interface FanOutEdge<F extends StateFields> {
  from: string;
  fanOut: readonly string[];
  join: string;
  when?: EdgeCondition<F>;
  label?: string;
}

export type EdgeDefinition<F extends StateFields> = TransitionEdge<F> | FanOutEdge<F>;

export interface StateCodec<F extends StateFields> {
  parse: (raw: unknown) => Partial<F>;
}

export interface WorkflowDefinition<F extends StateFields> {
  name: string;
  start: string;
  stages: readonly StageDefinition<F>[];
  edges: readonly EdgeDefinition<F>[];
  codec: StateCodec<F>;
}
