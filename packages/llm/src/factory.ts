// ──────────────────────────────────────────────
// JobPulse - Provider Factories
// ──────────────────────────────────────────────

import type { EmbeddingProvider, LLMProvider, LLMProviderType } from "@jobpulse/types";
import { GeminiProvider } from "./gemini-provider.js";
import { OpenAICompatibleProvider } from "./openai-compatible-provider.js";
import {
  GeminiEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type RemoteEmbeddingOptions,
} from "./embedding-providers.js";

export function createLLMProvider(
  provider: LLMProviderType,
  apiKey: string,
  model?: string
): LLMProvider {
  switch (provider) {
    case "gemini":
      return new GeminiProvider(apiKey, model);
    case "openai":
    case "groq":
      return new OpenAICompatibleProvider(provider, apiKey, model);
    default:
      throw new Error(`Unsupported LLM provider: ${String(provider)}`);
  }
}

export function createRemoteEmbeddingProvider(
  provider: "openai" | "gemini",
  options: RemoteEmbeddingOptions
): EmbeddingProvider {
  switch (provider) {
    case "openai":
      return new OpenAIEmbeddingProvider(options);
    case "gemini":
      return new GeminiEmbeddingProvider(options);
    default:
      throw new Error(`Unsupported embedding provider: ${String(provider)}`);
  }
}
