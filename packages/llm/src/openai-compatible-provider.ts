// ──────────────────────────────────────────────
// JobPulse - OpenAI-Compatible Chat Provider
// Serves OpenAI and Groq (same chat completions API)
// ──────────────────────────────────────────────

import type {
  LLMProvider,
  LLMRequestOptions,
  LLMResponse,
  LLMProviderType,
} from "@jobpulse/types";
import { DEFAULT_LLM_OPTIONS, PROVIDER_MODELS } from "@jobpulse/types";
import { sanitizeErrorMessage, startTimer, measureDuration } from "@jobpulse/utils";

export const CHAT_COMPLETION_ENDPOINTS: Record<Exclude<LLMProviderType, "gemini">, string> = {
  openai: "https://api.openai.com/v1/chat/completions",
  groq: "https://api.groq.com/openai/v1/chat/completions",
};

export class OpenAICompatibleProvider implements LLMProvider {
  readonly provider: Exclude<LLMProviderType, "gemini">;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(provider: Exclude<LLMProviderType, "gemini">, apiKey: string, model?: string) {
    this.provider = provider;
    this.apiKey = apiKey;
    this.model = (model && model.trim()) || PROVIDER_MODELS[provider];
    this.endpoint = CHAT_COMPLETION_ENDPOINTS[provider];
  }

  async generate(prompt: string, options: LLMRequestOptions = {}): Promise<LLMResponse> {
    const mergedOptions = { ...DEFAULT_LLM_OPTIONS, ...options };
    const timer = startTimer();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), mergedOptions.timeoutMs);

    try {
      const messages: Array<{ role: string; content: string }> = [];

      if (mergedOptions.systemPrompt) {
        messages.push({ role: "system", content: mergedOptions.systemPrompt });
      }
      messages.push({ role: "user", content: prompt });

      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        signal: controller.signal,
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: mergedOptions.maxTokens,
          temperature: mergedOptions.temperature,
          ...(mergedOptions.json ? { response_format: { type: "json_object" } } : {}),
        }),
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => "Unknown error");
        throw new Error(`${this.provider} API request failed with status ${response.status}: ${errorBody}`);
      }

      const data = await response.json() as ChatCompletionResponse;

      const content = data.choices?.[0]?.message?.content ?? "";
      const usage = data.usage ?? {
        prompt_tokens: 0,
        completion_tokens: 0,
        total_tokens: 0,
      };

      return {
        content,
        provider: this.provider,
        model: this.model,
        usage: {
          promptTokens: usage.prompt_tokens ?? 0,
          completionTokens: usage.completion_tokens ?? 0,
          totalTokens: usage.total_tokens ?? 0,
        },
        durationMs: measureDuration(timer),
      };
    } catch (error) {
      if (error instanceof DOMException && error.name === "AbortError") {
        throw new Error(`${this.provider} API request timed out after ${mergedOptions.timeoutMs}ms`);
      }
      throw new Error(`LLM provider error: ${sanitizeErrorMessage(error)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}
