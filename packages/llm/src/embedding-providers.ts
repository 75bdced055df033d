// ──────────────────────────────────────────────
// JobPulse - Remote Embedding Providers
// Timeouts, throttling and 5xx answers surface as
// transient EmbeddingFailures for the indexer to retry
// ──────────────────────────────────────────────

import type { EmbeddingProvider } from "@jobpulse/types";
import { EMBEDDING_MODELS } from "@jobpulse/types";
import { EmbeddingFailure, parseEmbedding, sanitizeErrorMessage } from "@jobpulse/utils";
import { GEMINI_API_BASE } from "./gemini-provider.js";

const OPENAI_EMBEDDINGS_ENDPOINT = "https://api.openai.com/v1/embeddings";
const DEFAULT_EMBEDDING_TIMEOUT_MS = 20000;

export interface RemoteEmbeddingOptions {
  apiKey: string;
  dimensions: number;
  model?: string;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: RemoteEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? EMBEDDING_MODELS.openai;
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS;
  }

  async embed(text: string): Promise<number[]> {
    const data = await postEmbeddingRequest<OpenAIEmbeddingResponse>(
      "OpenAI",
      OPENAI_EMBEDDINGS_ENDPOINT,
      { Authorization: `Bearer ${this.apiKey}` },
      { model: this.model, input: text, dimensions: this.dimensions },
      this.timeoutMs
    );
    return parseEmbedding(data.data?.[0]?.embedding);
  }
}

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: RemoteEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? EMBEDDING_MODELS.gemini;
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS;
  }

  async embed(text: string): Promise<number[]> {
    const data = await postEmbeddingRequest<GeminiEmbeddingResponse>(
      "Gemini",
      `${GEMINI_API_BASE}/${this.model}:embedContent`,
      { "x-goog-api-key": this.apiKey },
      {
        model: `models/${this.model}`,
        content: { parts: [{ text }] },
        outputDimensionality: this.dimensions,
      },
      this.timeoutMs
    );
    return parseEmbedding(data.embedding?.values);
  }
}

async function postEmbeddingRequest<T>(
  label: string,
  url: string,
  headers: Record<string, string>,
  body: Record<string, unknown>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      signal: controller.signal,
      body: JSON.stringify(body),
    });
  } catch (error) {
    if (error instanceof DOMException && error.name === "AbortError") {
      throw new EmbeddingFailure(`${label} embedding request timed out after ${timeoutMs}ms`, {
        transient: true,
      });
    }
    throw new EmbeddingFailure(`${label} embedding request failed: ${sanitizeErrorMessage(error)}`, {
      transient: true,
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    const errorBody = await response.text().catch(() => "Unknown error");
    throw new EmbeddingFailure(
      `${label} embedding request failed with status ${response.status}: ${errorBody}`,
      { transient: response.status === 429 || response.status >= 500 }
    );
  }

  return await response.json() as T;
}

interface OpenAIEmbeddingResponse {
  data?: Array<{ embedding?: number[] }>;
}

interface GeminiEmbeddingResponse {
  embedding?: { values?: number[] };
}
