// ──────────────────────────────────────────────
// JobPulse - Engine Package
// ──────────────────────────────────────────────

export { StageRegistry, createStageRegistry } from "./registry.js";
export {
  validateWorkflowGraph,
  checkTransitions,
  describeEdge,
  isFanOutEdge,
} from "./graph-validator.js";
export type {
  GraphValidationResult,
  TransitionCheckResult,
  TransitionViolation,
  TransitionViolationKind,
} from "./graph-validator.js";
export { createWorkflow } from "./workflow.js";
export type { CompiledWorkflow } from "./workflow.js";
export { ContextAssembler, renderQueryTemplate, DEFAULT_QUERY_MAX_CHARS } from "./context-assembler.js";
export type { AssembledContext } from "./context-assembler.js";
export {
  encodeCheckpoint,
  decodeCheckpoint,
  serializeCheckpoint,
  parseCheckpoint,
  restoreState,
  MemoryCheckpointStore,
  FileCheckpointStore,
} from "./checkpoint.js";
export { succeed, retry, fail } from "./stage-results.js";
export { executeWorkflow, DEFAULT_RETRY_POLICY, DEFAULT_MAX_INVOCATIONS } from "./execution-engine.js";
export type { EngineExecutionParams } from "./execution-engine.js";
