// ──────────────────────────────────────────────
// JobPulse - Shared Types
// ──────────────────────────────────────────────

export * from "./retrieval.js";
export * from "./workflow.js";
export * from "./execution.js";
export * from "./llm.js";
