// ──────────────────────────────────────────────
// JobPulse - Database Schema Index
// ──────────────────────────────────────────────

export { workflowCheckpoints } from "./workflow-checkpoints.js";
export type { WorkflowCheckpointRow, NewWorkflowCheckpointRow } from "./workflow-checkpoints.js";
