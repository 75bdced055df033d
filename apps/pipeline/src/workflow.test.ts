import test from "node:test";
import assert from "node:assert/strict";
import { MemoryCheckpointStore, createWorkflow, executeWorkflow, validateWorkflowGraph } from "@jobpulse/engine";
import { DocumentStore, EmbeddingIndexer, HashingEmbeddingProvider, Retriever } from "@jobpulse/retrieval";
import type { RawJobResult } from "./serpapi-client.js";
import { FakeJobSearch, FakeLLM, MemoryJobCache, pipelineResponder } from "./testing/fakes.js";
import { JOB_MARKET_WORKFLOW, buildJobMarketWorkflow } from "./workflow.js";

const plan = { roles: ["AI Engineer"], locations: ["Canada"] };

const postings: RawJobResult[] = [
  {
    title: "AI Engineer",
    company_name: "Northwind",
    location: "Toronto",
    description: "Design LLM retrieval pipelines in Python.",
    detected_extensions: { salary: "120K–140K a year", work_from_home: true },
  },
  {
    title: "Data Engineer",
    company_name: "Contoso",
    location: "Vancouver",
    description: "Build SQL warehouses for analytics.",
    detected_extensions: { salary: "$50 an hour" },
  },
];

class AbortingJobSearch extends FakeJobSearch {
  constructor(
    results: Record<string, RawJobResult[]>,
    private readonly controller: AbortController
  ) {
    super(results);
  }

  override async search(role: string, location: string): Promise<RawJobResult[]> {
    const results = await super.search(role, location);
    this.controller.abort();
    return results;
  }
}

function harness(
  responder = pipelineResponder,
  results: Record<string, RawJobResult[]> = { "AI Engineer|Canada": postings }
) {
  const llm = new FakeLLM(responder);
  const source = new FakeJobSearch(results);
  const cache = new MemoryJobCache();
  const documentStore = new DocumentStore(new EmbeddingIndexer(new HashingEmbeddingProvider(64)));
  const retriever = new Retriever(documentStore);
  const definition = buildJobMarketWorkflow({ llm, source, cache, plan });
  return { llm, source, cache, documentStore, retriever, definition };
}

test("the job market graph validates without errors", () => {
  const { definition } = harness();
  const validation = validateWorkflowGraph(definition);
  assert.deepEqual(validation.errors, []);
  assert.equal(validation.valid, true);
});

test("a full run collects, analyses and reports", async () => {
  const { llm, source, cache, documentStore, retriever, definition } = harness();
  const checkpointStore = new MemoryCheckpointStore();

  const result = await executeWorkflow({
    workflow: createWorkflow(definition),
    checkpointStore,
    documentStore,
    retriever,
    retryPolicy: { baseDelayMs: 0, maxDelayMs: 0 },
  });

  assert.equal(result.terminal, "END");
  assert.equal(result.invocationCount, 5);
  assert.deepEqual(source.queries, ["AI Engineer|Canada"]);
  assert.equal(cache.saved?.length, 2);
  assert.deepEqual(result.state.fields.finalReport?.statistics, {
    totalJobs: 2,
    aiRoles: 1,
    aiRolePercentage: 50,
    remotePercentage: 50,
    topSkills: [
      { name: "Python", count: 3 },
      { name: "SQL", count: 1 },
    ],
    salary: { sampleSize: 2, average: 117000, median: 117000, min: 104000, max: 130000 },
  });
  assert.deepEqual(
    [
      llm.count("Analyze these job postings"),
      llm.count("Analyze the job market"),
      llm.count("Assess the impact of AI"),
      llm.count("Write the sections"),
    ],
    [1, 1, 1, 1]
  );
  assert.equal(documentStore.size, 4);
  assert.deepEqual(
    [...documentStore.list({ kind: "job" })].map((doc) => doc.metadata["company"]),
    ["Northwind", "Contoso"]
  );
  assert.equal((await checkpointStore.load(JOB_MARKET_WORKFLOW))?.lastCompletedStage, "finalReport");
});

test("no postings is fatal in collectJobs and nothing downstream runs", async () => {
  const { llm, documentStore, retriever, definition } = harness(pipelineResponder, {});

  const result = await executeWorkflow({
    workflow: createWorkflow(definition),
    checkpointStore: new MemoryCheckpointStore(),
    documentStore,
    retriever,
    retryPolicy: { baseDelayMs: 0, maxDelayMs: 0 },
  });

  assert.equal(result.terminal, "ERROR");
  assert.equal(result.failedStage, "collectJobs");
  assert.equal(result.errorCode, "STAGE_FAILURE");
  assert.equal(result.state.error, 'Stage "collectJobs" failed: No job postings could be collected');
  assert.equal(llm.prompts.length, 0);
});

test("a rerun after a final report failure resumes at finalReport only", async () => {
  let reportAvailable = false;
  const responder = (prompt: string): string => {
    if (prompt.startsWith("Write the sections") && !reportAvailable) return "model overloaded";
    return pipelineResponder(prompt);
  };
  const { llm, source, documentStore, retriever, definition } = harness(responder);
  const checkpointStore = new MemoryCheckpointStore();
  const run = () =>
    executeWorkflow({
      workflow: createWorkflow(definition),
      checkpointStore,
      documentStore,
      retriever,
      retryPolicy: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    });

  const first = await run();
  assert.equal(first.terminal, "ERROR");
  assert.equal(first.failedStage, "finalReport");
  assert.equal(llm.count("Write the sections"), 2);

  reportAvailable = true;
  const promptsBefore = llm.prompts.length;
  const second = await run();

  assert.equal(second.terminal, "END");
  assert.equal(second.resumedFrom, "finalReport");
  assert.equal(second.invocationCount, 1);
  assert.deepEqual(
    second.steps.map((step) => [step.stage, step.status]),
    [
      ["collectJobs", "skipped"],
      ["analyzeTech", "skipped"],
      ["marketReport", "skipped"],
      ["aiImpact", "skipped"],
      ["finalReport", "completed"],
    ]
  );
  assert.deepEqual(
    llm.prompts.slice(promptsBefore).map((prompt) => prompt.split("\n")[0]),
    ["Write the sections of a job market analysis report."]
  );
  assert.equal(source.queries.length, 1);
});

test("a collection cancelled by the run signal is neither cached nor checkpointed", async () => {
  const controller = new AbortController();
  const source = new AbortingJobSearch({ "AI Engineer|Canada": postings }, controller);
  const llm = new FakeLLM(pipelineResponder);
  const cache = new MemoryJobCache();
  const documentStore = new DocumentStore(new EmbeddingIndexer(new HashingEmbeddingProvider(64)));
  const retriever = new Retriever(documentStore);
  const definition = buildJobMarketWorkflow({
    llm,
    source,
    cache,
    plan: { roles: ["AI Engineer"], locations: ["Canada", "Remote"] },
  });
  const checkpointStore = new MemoryCheckpointStore();
  const run = (signal?: AbortSignal) =>
    executeWorkflow({
      workflow: createWorkflow(definition),
      checkpointStore,
      documentStore,
      retriever,
      signal,
      retryPolicy: { baseDelayMs: 0, maxDelayMs: 0 },
    });

  const cancelled = await run(controller.signal);

  assert.equal(cancelled.terminal, "ERROR");
  assert.equal(cancelled.failedStage, "collectJobs");
  assert.equal(cancelled.errorCode, "CANCELLED");
  assert.deepEqual(source.queries, ["AI Engineer|Canada"]);
  assert.equal<MemoryJobCache["saved"]>(cache.saved, null);
  assert.equal(documentStore.size, 0);
  assert.deepEqual((await checkpointStore.load(JOB_MARKET_WORKFLOW))?.state.fields, {});

  const rerun = await run();

  assert.equal(rerun.terminal, "END");
  assert.equal(rerun.resumedFrom, "collectJobs");
  assert.equal(rerun.invocationCount, 5);
  assert.deepEqual(source.queries, ["AI Engineer|Canada", "AI Engineer|Canada", "AI Engineer|Remote"]);
  assert.equal(cache.saved?.length, 2);
  assert.equal(rerun.state.fields.jobData?.length, 2);
});
