// ──────────────────────────────────────────────
// JobPulse - Error Taxonomy
// ──────────────────────────────────────────────

export type JobPulseErrorCode =
  | "EMBEDDING_FAILURE"
  | "DIMENSION_MISMATCH"
  | "DUPLICATE_ID"
  | "DOCUMENT_NOT_FOUND"
  | "NO_VIABLE_TRANSITION"
  | "RUNAWAY_WORKFLOW"
  | "STAGE_FAILURE"
  | "GRAPH_VALIDATION"
  | "CHECKPOINT_FAILURE";

export class JobPulseError extends Error {
  readonly code: JobPulseErrorCode;
  readonly retryable: boolean;

  constructor(code: JobPulseErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Upstream embedding computation failed. `transient` failures (timeouts,
 * throttling, 5xx) are retried by the indexer; the rest are reported as-is.
 */
export class EmbeddingFailure extends JobPulseError {
  readonly transient: boolean;

  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super("EMBEDDING_FAILURE", message, { retryable: true, cause: options.cause });
    this.transient = options.transient ?? false;
  }
}

export class DimensionMismatchError extends JobPulseError {
  constructor(readonly expected: number, readonly actual: number, context: string) {
    super(
      "DIMENSION_MISMATCH",
      `Vector dimensionality mismatch in ${context}: expected ${expected}, got ${actual}`
    );
  }
}

export class DuplicateIdError extends JobPulseError {
  constructor(readonly documentId: string) {
    super("DUPLICATE_ID", `Document "${documentId}" already exists`);
  }
}

export class DocumentNotFoundError extends JobPulseError {
  constructor(readonly documentId: string) {
    super("DOCUMENT_NOT_FOUND", `Document "${documentId}" not found`);
  }
}

export class NoViableTransitionError extends JobPulseError {
  constructor(readonly stage: string) {
    super("NO_VIABLE_TRANSITION", `No outgoing edge of stage "${stage}" matched the current state`);
  }
}

export class RunawayWorkflowError extends JobPulseError {
  constructor(readonly limit: number) {
    super("RUNAWAY_WORKFLOW", `Stage invocation limit exceeded (${limit})`);
  }
}

export class StageFailure extends JobPulseError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super("STAGE_FAILURE", message, options);
  }
}

export class GraphValidationError extends JobPulseError {
  constructor(readonly errors: string[]) {
    super("GRAPH_VALIDATION", `Invalid workflow graph: ${errors.join("; ")}`);
  }
}

export class CheckpointError extends JobPulseError {
  constructor(message: string, cause?: unknown) {
    super("CHECKPOINT_FAILURE", message, { cause });
  }
}
