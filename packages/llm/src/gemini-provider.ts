// ──────────────────────────────────────────────
// JobPulse - Gemini Provider Implementation
// ──────────────────────────────────────────────

import type {
  LLMProvider,
  LLMRequestOptions,
  LLMResponse,
  LLMProviderType,
} from "@jobpulse/types";
import { DEFAULT_LLM_OPTIONS, PROVIDER_MODELS } from "@jobpulse/types";
import { sanitizeErrorMessage, startTimer, measureDuration } from "@jobpulse/utils";

export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";

// Retired model names still show up in .env files
const DEPRECATED_MODEL_MAP: Record<string, string> = {
  "gemini-pro": "gemini-2.0-flash",
  "gemini-1.0-pro": "gemini-2.0-flash",
  "gemini-1.5-flash": "gemini-2.0-flash",
};

export class GeminiProvider implements LLMProvider {
  readonly provider: LLMProviderType = "gemini";
  private readonly apiKey: string;
  private readonly model: string;

  constructor(apiKey: string, model?: string) {
    this.apiKey = apiKey;
    const requested = (model && model.trim()) || PROVIDER_MODELS.gemini;
    this.model = DEPRECATED_MODEL_MAP[requested] ?? requested;
  }

  async generate(prompt: string, options: LLMRequestOptions = {}): Promise<LLMResponse> {
    const mergedOptions = { ...DEFAULT_LLM_OPTIONS, ...options };
    const timer = startTimer();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), mergedOptions.timeoutMs);

    const body: GeminiGenerateRequest = {
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      generationConfig: {
        maxOutputTokens: mergedOptions.maxTokens,
        temperature: mergedOptions.temperature,
        ...(mergedOptions.json ? { responseMimeType: "application/json" } : {}),
      },
    };
    if (mergedOptions.systemPrompt) {
      body.systemInstruction = { parts: [{ text: mergedOptions.systemPrompt }] };
    }

    try {
      const response = await fetch(`${GEMINI_API_BASE}/${this.model}:generateContent`, {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-goog-api-key": this.apiKey },
        signal: controller.signal,
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => "Unknown error");
        throw new Error(`Gemini API request failed with status ${response.status}: ${errorBody}`);
      }

      const data = await response.json() as GeminiGenerateResponse;
      const parts = data.candidates?.[0]?.content?.parts ?? [];
      const content = parts.map((part) => part.text ?? "").join("");
      const usage = data.usageMetadata;

      return {
        content,
        provider: "gemini",
        model: this.model,
        usage: {
          promptTokens: usage?.promptTokenCount ?? 0,
          completionTokens: usage?.candidatesTokenCount ?? 0,
          totalTokens: usage?.totalTokenCount ?? 0,
        },
        durationMs: measureDuration(timer),
      };
    } catch (error) {
      if (error instanceof DOMException && error.name === "AbortError") {
        throw new Error(`Gemini API request timed out after ${mergedOptions.timeoutMs}ms`);
      }
      throw new Error(`LLM provider error: ${sanitizeErrorMessage(error)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

interface GeminiGenerateRequest {
  contents: Array<{ role: string; parts: Array<{ text: string }> }>;
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig: {
    maxOutputTokens: number;
    temperature: number;
    responseMimeType?: string;
  };
}

interface GeminiGenerateResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}
