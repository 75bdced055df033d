// ──────────────────────────────────────────────
// JobPulse - LLM Package
// ──────────────────────────────────────────────

export { GeminiProvider } from "./gemini-provider.js";
export { OpenAICompatibleProvider } from "./openai-compatible-provider.js";
export { GeminiEmbeddingProvider, OpenAIEmbeddingProvider } from "./embedding-providers.js";
export type { RemoteEmbeddingOptions } from "./embedding-providers.js";
export { createLLMProvider, createRemoteEmbeddingProvider } from "./factory.js";
