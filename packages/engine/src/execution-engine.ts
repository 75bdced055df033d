// ──────────────────────────────────────────────
// JobPulse - Workflow Execution Engine
// Pure domain logic, no HTTP or framework deps
// ──────────────────────────────────────────────

import type {
  CheckpointEvent,
  CheckpointStore,
  EngineErrorCode,
  FanOutEdge,
  NewDocument,
  RetryPolicy,
  StageAttemptSummary,
  StageDefinition,
  StageLogger,
  StageResult,
  StageStepResult,
  StateFields,
  StepStatus,
  TerminalState,
  WorkflowRunResult,
  WorkflowState,
  RetrievalQuery,
  EdgeDefinition,
} from "@jobpulse/types";
import { END } from "@jobpulse/types";
import type { DocumentStore, Retriever } from "@jobpulse/retrieval";
import {
  DuplicateIdError,
  EmbeddingFailure,
  NoViableTransitionError,
  RunawayWorkflowError,
  StageFailure,
  backoffDelay,
  createCorrelationId,
  createRunLogger,
  generateId,
  measureDuration,
  sanitizeErrorMessage,
  sleep,
  startTimer,
  type Logger,
} from "@jobpulse/utils";
import { encodeCheckpoint, restoreState } from "./checkpoint.js";
import { ContextAssembler, type AssembledContext } from "./context-assembler.js";
import { describeEdge, isFanOutEdge } from "./graph-validator.js";
import type { CompiledWorkflow } from "./workflow.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

export const DEFAULT_MAX_INVOCATIONS = 50;

export interface EngineExecutionParams<F extends StateFields> {
  workflow: CompiledWorkflow<F>;
  runId?: string;
  forceRestart?: boolean;
  checkpointStore?: CheckpointStore;
  checkpointKey?: string;
  documentStore?: DocumentStore;
  retriever?: Retriever;
  queryMaxChars?: number;
  retryPolicy?: Partial<RetryPolicy>;
  maxInvocations?: number;
  signal?: AbortSignal;
  onStageStart?: (stage: string, attempt: number) => Promise<void>;
  onStageComplete?: (step: StageStepResult) => Promise<void>;
  onCheckpoint?: (event: CheckpointEvent) => Promise<void>;
}

type StageOutcome =
  | { kind: "completed" }
  | { kind: "cancelled" }
  | { kind: "failed"; code: EngineErrorCode; detail: string };

type HaltOutcome = Exclude<StageOutcome, { kind: "completed" }>;

type AttemptFailure =
  | { kind: "retryable"; detail: string }
  | { kind: "fatal"; code: EngineErrorCode; detail: string };

type AttemptOutcome<F extends StateFields> =
  | { kind: "success"; output: Partial<F>; documentsStored: number }
  | AttemptFailure;

interface AttemptReport<F extends StateFields> {
  outcome: AttemptOutcome<F>;
  query: RetrievalQuery | null;
  documentsRetrieved: number;
}

interface FanOutReport {
  ran: string[];
  halt: { stage: string; outcome: HaltOutcome } | null;
}

export async function executeWorkflow<F extends StateFields>(
  params: EngineExecutionParams<F>
): Promise<WorkflowRunResult<F>> {
  const { workflow, checkpointStore, documentStore, onStageStart, onStageComplete, onCheckpoint } = params;

  const runId = params.runId ?? generateId();
  const correlationId = createCorrelationId();
  const logger = createRunLogger(runId, workflow.name, correlationId);
  const engineTimer = startTimer();

  const forceRestart = params.forceRestart ?? false;
  const checkpointKey = params.checkpointKey ?? workflow.name;
  const maxInvocations = params.maxInvocations ?? DEFAULT_MAX_INVOCATIONS;
  const basePolicy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...params.retryPolicy };
  const assembler = new ContextAssembler(params.retriever ?? null, params.queryMaxChars);
  const runSignal = params.signal ?? new AbortController().signal;

  let state: WorkflowState<F> = { fields: {}, error: null, control: { forceRestart } };
  const steps: StageStepResult[] = [];
  let invocationCount = 0;
  let lastCompletedStage: string | null = null;
  let checkpointSaved = false;
  let resumedFrom: string | null = null;
  let restored = false;

  logger.info(
    { stageCount: workflow.registry.names().length, edgeCount: workflow.edges.length, forceRestart },
    "Workflow execution started"
  );

  const emitHook = async (hook: string, invoke: () => Promise<void>): Promise<void> => {
    try {
      await invoke();
    } catch (err) {
      logger.warn({ hook, error: sanitizeErrorMessage(err) }, "Engine hook failed");
    }
  };

  const finish = (
    terminal: TerminalState,
    failure: { stage: string | null; code: EngineErrorCode; message: string } | null
  ): WorkflowRunResult<F> => {
    const result: WorkflowRunResult<F> = {
      runId,
      workflow: workflow.name,
      status: terminal === "END" ? "completed" : "failed",
      terminal,
      state: structuredClone(state),
      steps,
      invocationCount,
      failedStage: failure?.stage ?? null,
      errorCode: failure?.code ?? null,
      errorMessage: failure?.message ?? null,
      resumedFrom,
      checkpointSaved,
      totalDurationMs: measureDuration(engineTimer),
    };
    logger.info(
      {
        terminal,
        invocationCount,
        stepCount: steps.length,
        failedStage: result.failedStage,
        errorCode: result.errorCode,
        durationMs: result.totalDurationMs,
      },
      terminal === "END" ? "Workflow execution completed" : "Workflow execution halted"
    );
    return result;
  };

  // ── Checkpoint load (read at most once) ──
  if (checkpointStore && !forceRestart) {
    try {
      const record = await checkpointStore.load(checkpointKey);
      if (record && record.workflow !== workflow.name) {
        logger.warn(
          { checkpointWorkflow: record.workflow },
          "Checkpoint belongs to another workflow, starting fresh"
        );
      } else if (record) {
        const restoredState = restoreState(record, workflow.codec);
        if (restoredState.error) {
          logger.info({ previousError: restoredState.error }, "Clearing error from previous run");
        }
        state = { fields: restoredState.fields, error: null, control: { forceRestart: false } };
        lastCompletedStage = record.lastCompletedStage;
        restored = true;
        logger.info(
          { lastCompletedStage, savedAt: record.savedAt, fields: Object.keys(restoredState.fields) },
          "Checkpoint restored"
        );
      }
    } catch (err) {
      const message = `Checkpoint could not be loaded: ${sanitizeErrorMessage(err)}`;
      logger.error({ checkpointKey }, message);
      return finish("ERROR", { stage: null, code: "CHECKPOINT_FAILURE", message });
    }
  } else if (forceRestart) {
    logger.info("Force restart requested, ignoring any existing checkpoint");
  }

  // ── Checkpoint writes, serialised ──
  let saveChain: Promise<void> = Promise.resolve();
  const persist = (stage: string | null, reason: CheckpointEvent["reason"]): Promise<void> => {
    if (!checkpointStore) return Promise.resolve();
    const record = encodeCheckpoint(workflow.name, state, lastCompletedStage);
    const task = saveChain.then(async () => {
      await checkpointStore.save(checkpointKey, record);
      checkpointSaved = true;
      if (onCheckpoint) {
        await emitHook("onCheckpoint", () => onCheckpoint({ workflow: workflow.name, stage, reason, record }));
      }
    });
    // the caller sees the failure through `task`; later saves still run
    saveChain = task.catch((err: unknown) => {
      logger.debug({ stage, reason, error: sanitizeErrorMessage(err) }, "Checkpoint write failed");
    });
    return task;
  };

  const recordStep = async (step: StageStepResult): Promise<void> => {
    steps.push(step);
    if (onStageComplete) {
      await emitHook("onStageComplete", () => onStageComplete(step));
    }
  };

  const recordSkipped = async (stage: string): Promise<void> => {
    logger.info({ stage }, "Stage outputs restored from checkpoint, skipping");
    await recordStep({
      stage,
      status: "skipped",
      attempts: [],
      attemptCount: 0,
      query: null,
      documentsRetrieved: 0,
      documentsStored: 0,
      durationMs: 0,
      error: "Outputs restored from checkpoint",
    });
  };

  const storeDocuments = async (documents: readonly NewDocument[]): Promise<number> => {
    if (documents.length === 0) return 0;
    if (!documentStore) {
      throw new StageFailure("Stage returned documents but no document store is configured");
    }

    let stored = 0;
    for (const doc of documents) {
      const existing = doc.id === undefined ? undefined : documentStore.find(doc.id);
      if (existing) {
        if (existing.text === doc.text) continue;
        throw new DuplicateIdError(existing.id);
      }
      await documentStore.put(doc);
      stored += 1;
    }
    return stored;
  };

  const acceptResult = async (
    stage: StageDefinition<F>,
    result: StageResult<F>
  ): Promise<AttemptOutcome<F>> => {
    if (result.status === "retryable") {
      return { kind: "retryable", detail: result.errorDetail ?? "Stage requested a retry" };
    }
    if (result.status === "fatal") {
      return { kind: "fatal", code: "STAGE_FAILURE", detail: result.errorDetail ?? "Stage reported a fatal error" };
    }

    const owned = new Set<string>(stage.owns);
    const unowned = Object.keys(result.output).filter((field) => !owned.has(field));
    if (unowned.length > 0) {
      return {
        kind: "fatal",
        code: "STAGE_FAILURE",
        detail: `Stage wrote fields it does not own: ${unowned.join(", ")}`,
      };
    }

    let output: Partial<F>;
    try {
      output = workflow.codec.parse(result.output);
    } catch (err) {
      return { kind: "fatal", code: "STAGE_FAILURE", detail: `Stage output failed validation: ${sanitizeErrorMessage(err)}` };
    }

    const documentsStored = await storeDocuments(result.documents ?? []);
    return { kind: "success", output, documentsStored };
  };

  const attemptStage = async (
    stage: StageDefinition<F>,
    attempt: number,
    view: WorkflowState<F>,
    signal: AbortSignal,
    stageLogger: StageLogger
  ): Promise<AttemptReport<F>> => {
    let assembled: AssembledContext = { query: null, documents: [] };
    try {
      assembled = await assembler.assemble(stage, view);
      const result = await stage.run(structuredClone(view), assembled.documents, {
        runId,
        workflow: workflow.name,
        stage: stage.name,
        attempt,
        logger: stageLogger,
        signal,
      });
      const outcome = await acceptResult(stage, result);
      return { outcome, query: assembled.query, documentsRetrieved: assembled.documents.length };
    } catch (err) {
      return { outcome: classifyError(err), query: assembled.query, documentsRetrieved: assembled.documents.length };
    }
  };

  const runStage = async (name: string, signal: AbortSignal, snapshot?: WorkflowState<F>): Promise<StageOutcome> => {
    const stage = workflow.stage(name);
    const policy: RetryPolicy = { ...basePolicy, ...stage.retry };
    const stageLogger = createStageLogger(logger, name);
    const stepTimer = startTimer();
    const attempts: StageAttemptSummary[] = [];
    let query: RetrievalQuery | null = null;
    let documentsRetrieved = 0;
    let documentsStored = 0;

    const record = async (status: StepStatus, error: string | null): Promise<void> => {
      await recordStep({
        stage: name,
        status,
        attempts,
        attemptCount: attempts.length,
        query,
        documentsRetrieved,
        documentsStored,
        durationMs: measureDuration(stepTimer),
        error,
      });
    };

    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) {
        logger.info({ stage: name, attempt }, "Stage cancelled before attempt");
        await record("cancelled", "Cancelled");
        return { kind: "cancelled" };
      }
      if (invocationCount >= maxInvocations) {
        const detail = new RunawayWorkflowError(maxInvocations).message;
        await record("failed", detail);
        return { kind: "failed", code: "RUNAWAY_WORKFLOW", detail };
      }

      invocationCount += 1;
      if (onStageStart) {
        await emitHook("onStageStart", () => onStageStart(name, attempt));
      }
      logger.info({ stage: name, attempt, maxAttempts: policy.maxAttempts }, "Stage started");

      const attemptTimer = startTimer();
      const report = await attemptStage(stage, attempt, snapshot ?? state, signal, stageLogger);
      const { outcome } = report;
      query = report.query;
      documentsRetrieved = report.documentsRetrieved;

      if (outcome.kind === "success") {
        attempts.push({ attempt, status: "completed", durationMs: measureDuration(attemptTimer), reason: null });
        documentsStored = outcome.documentsStored;
        state = { ...state, fields: { ...state.fields, ...outcome.output } };
        lastCompletedStage = name;

        try {
          await persist(name, "commit");
        } catch (err) {
          const detail = `Checkpoint write failed: ${sanitizeErrorMessage(err)}`;
          await record("failed", detail);
          return { kind: "failed", code: "CHECKPOINT_FAILURE", detail };
        }

        logger.info(
          { stage: name, attempt, fields: Object.keys(outcome.output), documentsStored },
          "Stage committed"
        );
        await record("completed", null);
        return { kind: "completed" };
      }

      if (outcome.kind === "fatal") {
        attempts.push({ attempt, status: "failed", durationMs: measureDuration(attemptTimer), reason: outcome.detail });
        await record("failed", outcome.detail);
        return { kind: "failed", code: outcome.code, detail: outcome.detail };
      }

      // A stage that saw the abort reports Retryable; nothing it produced is committed
      if (signal.aborted) {
        attempts.push({ attempt, status: "retry", durationMs: measureDuration(attemptTimer), reason: outcome.detail });
        logger.info({ stage: name, attempt, reason: outcome.detail }, "Stage cancelled during attempt");
        await record("cancelled", "Cancelled");
        return { kind: "cancelled" };
      }

      if (attempt >= policy.maxAttempts) {
        attempts.push({ attempt, status: "failed", durationMs: measureDuration(attemptTimer), reason: outcome.detail });
        const detail = `retry attempts exhausted (${attempt}/${policy.maxAttempts}): ${outcome.detail}`;
        await record("failed", detail);
        return { kind: "failed", code: "STAGE_FAILURE", detail };
      }

      attempts.push({ attempt, status: "retry", durationMs: measureDuration(attemptTimer), reason: outcome.detail });
      const delayMs = backoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs);
      logger.warn(
        { stage: name, attempt, maxAttempts: policy.maxAttempts, delayMs, reason: outcome.detail },
        "Stage requested retry"
      );
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  };

  const isStageComplete = (name: string): boolean =>
    workflow.stage(name).owns.every((field) => state.fields[field] !== undefined && state.fields[field] !== null);

  const runFanOut = async (edge: FanOutEdge<F>, resuming: boolean): Promise<FanOutReport> => {
    const snapshot = structuredClone(state);
    const controller = new AbortController();
    const abortBranches = (): void => controller.abort();
    if (runSignal.aborted) {
      controller.abort();
    } else {
      runSignal.addEventListener("abort", abortBranches, { once: true });
    }

    const pending: string[] = [];
    for (const branch of edge.fanOut) {
      if (resuming && isStageComplete(branch)) {
        await recordSkipped(branch);
      } else {
        pending.push(branch);
      }
    }

    logger.info({ from: edge.from, branches: pending, join: edge.join }, "Fan-out started");
    const halts: Array<{ stage: string; outcome: HaltOutcome }> = [];

    try {
      await Promise.all(
        pending.map(async (branch) => {
          const outcome = await runStage(branch, controller.signal, snapshot);
          if (outcome.kind === "completed") return;
          if (outcome.kind === "failed" && !controller.signal.aborted) {
            logger.warn({ stage: branch, code: outcome.code }, "Branch failed, cancelling siblings");
            controller.abort();
          }
          halts.push({ stage: branch, outcome });
        })
      );
    } finally {
      runSignal.removeEventListener("abort", abortBranches);
    }

    const firstHalt = halts.find((entry) => entry.outcome.kind === "failed") ?? halts[0] ?? null;
    return { ran: pending, halt: firstHalt };
  };

  const halt = async (stage: string, outcome: HaltOutcome): Promise<WorkflowRunResult<F>> => {
    const code: EngineErrorCode = outcome.kind === "cancelled" ? "CANCELLED" : outcome.code;
    const detail = outcome.kind === "cancelled" ? "run cancelled" : outcome.detail;
    const message = `Stage "${stage}" failed: ${detail}`;
    state = { ...state, error: message };
    logger.error({ stage, code }, message);

    try {
      await persist(stage, "error");
    } catch (err) {
      logger.error({ stage, error: sanitizeErrorMessage(err) }, "Failed to persist error checkpoint");
    }
    return finish("ERROR", { stage, code, message });
  };

  const selectEdge = (node: string): EdgeDefinition<F> | null => {
    for (const edge of workflow.outgoing(node)) {
      if (edge.when?.(state) ?? true) {
        logger.debug({ stage: node, edge: describeEdge(edge) }, "Transition selected");
        return edge;
      }
    }
    return null;
  };

  // ── Main loop ──
  let node = workflow.start;
  let resuming = restored;
  const walked = new Set<string>();

  while (node !== END) {
    if (resuming && !walked.has(node) && isStageComplete(node)) {
      walked.add(node);
      await recordSkipped(node);
    } else {
      if (resuming) {
        resuming = false;
        resumedFrom = node;
        logger.info({ stage: node }, "Resuming workflow");
      }
      const outcome = await runStage(node, runSignal);
      if (outcome.kind !== "completed") {
        return await halt(node, outcome);
      }
    }

    let edge: EdgeDefinition<F> | null;
    try {
      edge = selectEdge(node);
    } catch (err) {
      return await halt(node, {
        kind: "failed",
        code: "STAGE_FAILURE",
        detail: `Edge condition threw: ${sanitizeErrorMessage(err)}`,
      });
    }
    if (!edge) {
      return await halt(node, {
        kind: "failed",
        code: "NO_VIABLE_TRANSITION",
        detail: new NoViableTransitionError(node).message,
      });
    }

    if (isFanOutEdge(edge)) {
      const report = await runFanOut(edge, resuming);
      if (report.halt) {
        return await halt(report.halt.stage, report.halt.outcome);
      }
      if (resuming && report.ran.length > 0) {
        resuming = false;
        resumedFrom = report.ran[0] ?? null;
        logger.info({ branches: report.ran }, "Resuming workflow at fan-out");
      }
      node = edge.join;
    } else {
      node = edge.to;
    }
  }

  try {
    await persist(lastCompletedStage, "final");
  } catch (err) {
    logger.warn({ error: sanitizeErrorMessage(err) }, "Final checkpoint write failed");
  }
  return finish("END", null);
}

function classifyError(err: unknown): AttemptFailure {
  const detail = sanitizeErrorMessage(err);
  if (err instanceof StageFailure) {
    return err.retryable ? { kind: "retryable", detail } : { kind: "fatal", code: "STAGE_FAILURE", detail };
  }
  if (err instanceof EmbeddingFailure) {
    return { kind: "retryable", detail };
  }
  if (err instanceof DuplicateIdError) {
    return { kind: "fatal", code: "DUPLICATE_ID", detail };
  }
  return { kind: "fatal", code: "STAGE_FAILURE", detail };
}

function createStageLogger(logger: Logger, stage: string): StageLogger {
  return {
    info: (msg, data) => logger.info({ stage, ...data }, msg),
    warn: (msg, data) => logger.warn({ stage, ...data }, msg),
    error: (msg, data) => logger.error({ stage, ...data }, msg),
    debug: (msg, data) => logger.debug({ stage, ...data }, msg),
  };
}
