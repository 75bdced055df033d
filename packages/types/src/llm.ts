// ──────────────────────────────────────────────
// JobPulse - LLM Types
// ──────────────────────────────────────────────

export type LLMProviderType = "openai" | "gemini" | "groq";

export const LLM_PROVIDERS: LLMProviderType[] = ["openai", "gemini", "groq"];

export type EmbeddingProviderType = "hash" | "openai" | "gemini";

export const EMBEDDING_PROVIDERS: EmbeddingProviderType[] = ["hash", "openai", "gemini"];

export interface LLMRequestOptions {
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  systemPrompt?: string;
  // Ask the backend for a JSON object answer where it supports that
  json?: boolean;
}

export interface LLMResponse {
  content: string;
  provider: LLMProviderType;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  durationMs: number;
}

export interface LLMProvider {
  readonly provider: LLMProviderType;
  generate(prompt: string, options?: LLMRequestOptions): Promise<LLMResponse>;
}

export const DEFAULT_LLM_OPTIONS: Required<LLMRequestOptions> = {
  maxTokens: 2048,
  temperature: 0,
  timeoutMs: 60000,
  systemPrompt: "You are a precise job market analyst.",
  json: false,
};

export const PROVIDER_MODELS: Record<LLMProviderType, string> = {
  openai: "gpt-4o-mini",
  gemini: "gemini-2.0-flash",
  groq: "llama-3.3-70b-versatile",
};

export const EMBEDDING_MODELS: Record<Exclude<EmbeddingProviderType, "hash">, string> = {
  openai: "text-embedding-3-small",
  gemini: "text-embedding-004",
};
