import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { getEnvAsFloat, getEnvAsNumber, loadConfig } from "./config.js";

const KEYS = [
  "SERPAPI_API_KEY",
  "LLM_API_KEY",
  "LLM_PROVIDER",
  "LLM_MODEL",
  "EMBEDDING_PROVIDER",
  "EMBEDDING_API_KEY",
  "EMBEDDING_MODEL",
  "EMBEDDING_DIMENSIONS",
  "DATABASE_URL",
  "STAGE_MAX_ATTEMPTS",
  "STAGE_RETRY_BASE_MS",
  "STAGE_RETRY_MAX_MS",
  "WORKFLOW_MAX_INVOCATIONS",
  "RETRIEVAL_SEMANTIC_WEIGHT",
  "RETRIEVAL_LEXICAL_WEIGHT",
];

let saved: Record<string, string | undefined> = {};

beforeEach(() => {
  saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]));
  for (const key of KEYS) delete process.env[key];
});

afterEach(() => {
  for (const key of KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

test("loadConfig requires the search and model keys", () => {
  process.env["LLM_API_KEY"] = "test-llm-key";
  assert.throws(() => loadConfig(), /Missing required environment variable: SERPAPI_API_KEY/);
});

test("loadConfig applies defaults", () => {
  process.env["SERPAPI_API_KEY"] = "test-serp-key";
  process.env["LLM_API_KEY"] = "test-llm-key";

  const config = loadConfig();

  assert.equal(config.llm.provider, "openai");
  assert.equal(config.llm.model, null);
  assert.deepEqual(config.embedding, { provider: "hash", apiKey: null, model: null, dimensions: 512 });
  assert.equal(config.databaseUrl, null);
  assert.deepEqual(config.retrieval, { semanticWeight: 0.5, lexicalWeight: 0.5 });
  assert.deepEqual(config.engine, { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10000, maxInvocations: 50 });
});

test("loadConfig reads provider choices and falls back to the model key for embeddings", () => {
  process.env["SERPAPI_API_KEY"] = "test-serp-key";
  process.env["LLM_API_KEY"] = "test-llm-key";
  process.env["LLM_PROVIDER"] = "Gemini";
  process.env["EMBEDDING_PROVIDER"] = "openai";
  process.env["EMBEDDING_DIMENSIONS"] = "256";
  process.env["STAGE_MAX_ATTEMPTS"] = "5";
  process.env["RETRIEVAL_SEMANTIC_WEIGHT"] = "0.7";

  const config = loadConfig();

  assert.equal(config.llm.provider, "gemini");
  assert.equal(config.embedding.provider, "openai");
  assert.equal(config.embedding.apiKey, "test-llm-key");
  assert.equal(config.embedding.dimensions, 256);
  assert.equal(config.engine.maxAttempts, 5);
  assert.equal(config.retrieval.semanticWeight, 0.7);
});

test("loadConfig rejects an unknown provider", () => {
  process.env["SERPAPI_API_KEY"] = "test-serp-key";
  process.env["LLM_API_KEY"] = "test-llm-key";
  process.env["LLM_PROVIDER"] = "mystery";
  assert.throws(() => loadConfig(), /LLM_PROVIDER must be one of openai, gemini, groq, got: mystery/);
});

test("loadConfig rejects negative or all-zero retrieval weights", () => {
  process.env["SERPAPI_API_KEY"] = "test-serp-key";
  process.env["LLM_API_KEY"] = "test-llm-key";

  process.env["RETRIEVAL_LEXICAL_WEIGHT"] = "-0.2";
  assert.throws(
    () => loadConfig(),
    /^Error: Retrieval weights must not be negative, got semantic=0.5 lexical=-0.2$/
  );

  process.env["RETRIEVAL_SEMANTIC_WEIGHT"] = "0";
  process.env["RETRIEVAL_LEXICAL_WEIGHT"] = "0";
  assert.throws(() => loadConfig(), /Retrieval weights must not both be zero/);

  process.env["RETRIEVAL_LEXICAL_WEIGHT"] = "1";
  assert.deepEqual(loadConfig().retrieval, { semanticWeight: 0, lexicalWeight: 1 });
});

test("numeric getters reject malformed values", () => {
  process.env["STAGE_MAX_ATTEMPTS"] = "three";
  assert.throws(() => getEnvAsNumber("STAGE_MAX_ATTEMPTS", 3), /must be a number, got: three/);
  process.env["RETRIEVAL_SEMANTIC_WEIGHT"] = "heavy";
  assert.throws(() => getEnvAsFloat("RETRIEVAL_SEMANTIC_WEIGHT", 0.5), /must be a number, got: heavy/);
});
