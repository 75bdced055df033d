// ──────────────────────────────────────────────
// JobPulse - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, createCorrelationId, createRunLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadConfig,
  getEnvOrThrow,
  getEnvOrDefault,
  getEnvOptional,
  getEnvAsNumber,
  getEnvAsFloat,
} from "./config.js";
export type { AppConfig } from "./config.js";
export {
  generateId,
  contentId,
  sleep,
  backoffDelay,
  safeJsonParse,
  stripCodeFences,
  truncateString,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  redactSecrets,
  isRecord,
  readPathValue,
} from "./helpers.js";
export {
  tokenize,
  buildHashedEmbedding,
  normalizeVector,
  cosineSimilarity,
  parseEmbedding,
} from "./knowledge.js";
export {
  JobPulseError,
  EmbeddingFailure,
  DimensionMismatchError,
  DuplicateIdError,
  DocumentNotFoundError,
  NoViableTransitionError,
  RunawayWorkflowError,
  StageFailure,
  GraphValidationError,
  CheckpointError,
} from "./errors.js";
export type { JobPulseErrorCode } from "./errors.js";
