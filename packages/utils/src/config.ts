// ──────────────────────────────────────────────
// JobPulse - Environment Configuration Helper
// ──────────────────────────────────────────────

import type { EmbeddingProviderType, LLMProviderType } from "@jobpulse/types";
import { EMBEDDING_PROVIDERS, LLM_PROVIDERS } from "@jobpulse/types";

export function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvOptional(key: string): string | null {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value : null;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export function getEnvAsFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

function getEnvAsChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  if (!value) return defaultValue;
  const match = choices.find((choice) => choice === value.trim().toLowerCase());
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
  }
  return match;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  dataDir: string;
  reportsDir: string;
  databaseUrl: string | null;

  serpapi: {
    apiKey: string;
    requestDelayMs: number;
  };

  llm: {
    provider: LLMProviderType;
    apiKey: string;
    model: string | null;
  };

  embedding: {
    provider: EmbeddingProviderType;
    apiKey: string | null;
    model: string | null;
    dimensions: number;
  };

  retrieval: {
    semanticWeight: number;
    lexicalWeight: number;
  };

  engine: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    maxInvocations: number;
  };
}

function loadRetrievalWeights(): AppConfig["retrieval"] {
  const semanticWeight = getEnvAsFloat("RETRIEVAL_SEMANTIC_WEIGHT", 0.5);
  const lexicalWeight = getEnvAsFloat("RETRIEVAL_LEXICAL_WEIGHT", 0.5);
  if (semanticWeight < 0 || lexicalWeight < 0) {
    throw new Error(
      `Retrieval weights must not be negative, got semantic=${semanticWeight} lexical=${lexicalWeight}`
    );
  }
  if (semanticWeight + lexicalWeight === 0) {
    throw new Error("Retrieval weights must not both be zero");
  }
  return { semanticWeight, lexicalWeight };
}

export function loadConfig(): AppConfig {
  const llmApiKey = getEnvOrThrow("LLM_API_KEY");
  const embeddingProvider = getEnvAsChoice("EMBEDDING_PROVIDER", EMBEDDING_PROVIDERS, "hash");

  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),
    dataDir: getEnvOrDefault("DATA_DIR", "data"),
    reportsDir: getEnvOrDefault("REPORTS_DIR", "reports"),
    databaseUrl: getEnvOptional("DATABASE_URL"),

    serpapi: {
      apiKey: getEnvOrThrow("SERPAPI_API_KEY"),
      requestDelayMs: getEnvAsNumber("SERPAPI_REQUEST_DELAY_MS", 1000),
    },

    llm: {
      provider: getEnvAsChoice("LLM_PROVIDER", LLM_PROVIDERS, "openai"),
      apiKey: llmApiKey,
      model: getEnvOptional("LLM_MODEL"),
    },

    embedding: {
      provider: embeddingProvider,
      apiKey: getEnvOptional("EMBEDDING_API_KEY") ?? (embeddingProvider === "hash" ? null : llmApiKey),
      model: getEnvOptional("EMBEDDING_MODEL"),
      dimensions: getEnvAsNumber("EMBEDDING_DIMENSIONS", 512),
    },

    retrieval: loadRetrievalWeights(),

    engine: {
      maxAttempts: getEnvAsNumber("STAGE_MAX_ATTEMPTS", 3),
      baseDelayMs: getEnvAsNumber("STAGE_RETRY_BASE_MS", 1000),
      maxDelayMs: getEnvAsNumber("STAGE_RETRY_MAX_MS", 10000),
      maxInvocations: getEnvAsNumber("WORKFLOW_MAX_INVOCATIONS", 50),
    },
  };
}
