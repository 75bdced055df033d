// ──────────────────────────────────────────────
// JobPulse - Structured LLM Answers
// ──────────────────────────────────────────────

import type { z } from "zod";
import type { LLMProvider, LLMRequestOptions } from "@jobpulse/types";
import { StageFailure, safeJsonParse, sanitizeErrorMessage, stripCodeFences } from "@jobpulse/utils";

export type StructuredAnswer<T> =
  | { success: true; data: T }
  | { success: false; error: string; raw: string };

export function parseStructuredAnswer<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): StructuredAnswer<T> {
  const json = safeJsonParse(stripCodeFences(content));
  if (!json.success) {
    return { success: false, error: `Model answer is not valid JSON: ${json.error}`, raw: content };
  }

  const parsed = schema.safeParse(json.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return { success: false, error: `Model answer failed validation: ${issues.join("; ")}`, raw: content };
  }

  return { success: true, data: parsed.data };
}

/** Calls the model; transport failures surface as retryable stage failures. */
export async function generateStructured<T>(
  llm: LLMProvider,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: LLMRequestOptions = {}
): Promise<StructuredAnswer<T>> {
  let content: string;
  try {
    const response = await llm.generate(prompt, { ...options, json: true });
    content = response.content;
  } catch (err) {
    throw new StageFailure(`LLM request failed: ${sanitizeErrorMessage(err)}`, { retryable: true, cause: err });
  }
  return parseStructuredAnswer(content, schema);
}

export function renderDocumentContext(
  documents: ReadonlyArray<{ id: string; text: string }>,
  maxCharsPerDocument = 600
): string {
  if (documents.length === 0) return "(no supporting documents)";
  return documents
    .map((doc, index) => {
      const text = doc.text.length > maxCharsPerDocument ? `${doc.text.slice(0, maxCharsPerDocument)}...` : doc.text;
      return `[${index + 1}] ${text}`;
    })
    .join("\n\n");
}
