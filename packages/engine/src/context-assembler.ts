// ──────────────────────────────────────────────
// JobPulse - Context Assembler
// Renders a stage's query template against the current
// state and fetches the matching documents
// ──────────────────────────────────────────────

import type {
  Document,
  RetrievalQuery,
  StageDefinition,
  StateFields,
  WorkflowState,
} from "@jobpulse/types";
import type { Retriever } from "@jobpulse/retrieval";
import { readPathValue } from "@jobpulse/utils";

export const DEFAULT_QUERY_MAX_CHARS = 1000;

export interface AssembledContext {
  query: RetrievalQuery | null;
  documents: Document[];
}

export class ContextAssembler {
  constructor(
    private readonly retriever: Retriever | null,
    private readonly queryMaxChars = DEFAULT_QUERY_MAX_CHARS
  ) {}

  async assemble<F extends StateFields>(
    stage: StageDefinition<F>,
    state: WorkflowState<F>
  ): Promise<AssembledContext> {
    const retrieval = stage.retrieval;
    if (!retrieval) {
      return { query: null, documents: [] };
    }

    const text = renderQueryTemplate(retrieval.queryTemplate, state.fields).trim().slice(0, this.queryMaxChars);
    if (text.length === 0) {
      return { query: null, documents: [] };
    }
    if (!this.retriever) {
      throw new Error(`Stage "${stage.name}" declares retrieval but no retriever is configured`);
    }

    const query: RetrievalQuery = { text, topK: retrieval.topK, mode: retrieval.mode };
    const documents = await this.retriever.retrieve(query);
    return { query, documents };
  }
}

/** `{{field.path}}` placeholders; objects render as JSON, missing values as nothing. */
export function renderQueryTemplate(template: string, fields: object): string {
  return template.replace(/\{\{\s*([\w-]+(?:\.[\w-]+)*)\s*\}\}/g, (_match, path: string) => {
    const value = readPathValue(fields, path);
    if (value === undefined || value === null) return "";
    if (typeof value === "object") return JSON.stringify(value);
    return String(value);
  });
}
