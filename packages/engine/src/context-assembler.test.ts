import test from "node:test";
import assert from "node:assert/strict";
import type { StageDefinition, WorkflowState } from "@jobpulse/types";
import { DocumentStore, EmbeddingIndexer, HashingEmbeddingProvider, Retriever } from "@jobpulse/retrieval";
import { ContextAssembler, renderQueryTemplate, succeed } from "./index.js";

type Fields = { techAnalysis: { topSkills: string[] }; region: string };

function stageWith(retrieval?: StageDefinition<Fields>["retrieval"]): StageDefinition<Fields> {
  return { name: "aiImpact", owns: ["region"], retrieval, run: async () => succeed({}) };
}

const state: WorkflowState<Fields> = {
  fields: { techAnalysis: { topSkills: ["python", "pytorch"] }, region: "EU" },
  error: null,
  control: { forceRestart: false },
};

test("renders paths, JSON for objects and nothing for missing values", () => {
  assert.equal(
    renderQueryTemplate("AI impact in {{region}} for {{ techAnalysis.topSkills }} {{unknown.path}}", state.fields),
    'AI impact in EU for ["python","pytorch"] '
  );
});

test("stages without retrieval get no query and no documents", async () => {
  const assembler = new ContextAssembler(null);
  assert.deepEqual(await assembler.assemble(stageWith(), state), { query: null, documents: [] });
});

test("an empty rendered query skips retrieval", async () => {
  const assembler = new ContextAssembler(null);
  const context = await assembler.assemble(stageWith({ queryTemplate: "  {{missing}} ", mode: "hybrid", topK: 3 }), state);
  assert.deepEqual(context, { query: null, documents: [] });
});

test("queries are clamped and run through the retriever", async () => {
  const store = new DocumentStore(new EmbeddingIndexer(new HashingEmbeddingProvider()));
  await store.putMany([
    { id: "eu", text: "EU AI act compliance engineer" },
    { id: "us", text: "US sales manager" },
  ]);
  const assembler = new ContextAssembler(new Retriever(store), 12);

  const context = await assembler.assemble(
    stageWith({ queryTemplate: "{{region}} AI act compliance roles", mode: "lexical", topK: 2 }),
    state
  );

  assert.deepEqual(context.query, { text: "EU AI act co", topK: 2, mode: "lexical" });
  assert.deepEqual(context.documents.map((doc) => doc.id), ["eu"]);
});

test("retrieval without a retriever is reported", async () => {
  const assembler = new ContextAssembler(null);
  await assert.rejects(
    assembler.assemble(stageWith({ queryTemplate: "{{region}}", mode: "semantic", topK: 1 }), state),
    /declares retrieval but no retriever is configured/
  );
});
