import test from "node:test";
import assert from "node:assert/strict";
import { FakeLLM, TECH_ANSWER, jobRecord, stageContext } from "../testing/fakes.js";
import {
  ANALYZE_TECH_STAGE,
  batchJobs,
  buildBatchPrompt,
  createAnalyzeTechStage,
  previewDescription,
} from "./analyze-tech.js";

function jobs(count: number) {
  return Array.from({ length: count }, (_, i) => jobRecord({ title: `Engineer ${i}`, company: `Company ${i}` }));
}

function state(jobData: ReturnType<typeof jobs>) {
  return { fields: { jobData }, error: null, control: { forceRestart: false } };
}

test("batchJobs splits into fixed-size batches", () => {
  assert.deepEqual(
    batchJobs([1, 2, 3, 4, 5], 2),
    [[1, 2], [3, 4], [5]]
  );
});

test("previewDescription clips long descriptions to 500 characters", () => {
  assert.equal(previewDescription("x".repeat(500)), "x".repeat(500));
  assert.equal(previewDescription("x".repeat(600)), `${"x".repeat(500)}...`);
  const prompt = buildBatchPrompt([jobRecord({ title: "SRE", company: "Acme", description: "y".repeat(700) })]);
  assert.ok(prompt.includes(`"description":"${"y".repeat(500)}..."`));
});

test("analyzeTech merges batch analyses and skips unparseable batches", async () => {
  const llm = new FakeLLM((_prompt, call) => (call === 2 ? "I cannot answer that" : TECH_ANSWER));
  const stage = createAnalyzeTechStage({ llm });

  const result = await stage.run(state(jobs(45)), [], stageContext(ANALYZE_TECH_STAGE));

  assert.equal(llm.prompts.length, 3);
  assert.equal(result.status, "success");
  assert.deepEqual(result.output.techAnalysis, {
    technicalSkills: { Python: 6, SQL: 2 },
    techStacks: { "AWS + Kubernetes": 4 },
    emergingTrends: ["LLM agents"],
    educationRequirements: { "BSc Computer Science": 4 },
    batchesAnalyzed: 2,
    batchesSkipped: 1,
  });
  assert.equal(result.documents?.length, 1);
  assert.equal(
    result.documents?.[0]?.text,
    [
      "Technology requirements summary.",
      "Top technical skills: Python (6), SQL (2).",
      "Common tech stacks: AWS + Kubernetes (4).",
      "Emerging trends: LLM agents.",
      "Education requirements: BSc Computer Science (4).",
    ].join("\n")
  );
  assert.deepEqual(result.documents?.[0]?.metadata, { kind: "tech-analysis" });
});

test("analyzeTech asks for a retry when no batch is usable", async () => {
  const llm = new FakeLLM(() => "{}}");
  const stage = createAnalyzeTechStage({ llm });

  const result = await stage.run(state(jobs(3)), [], stageContext(ANALYZE_TECH_STAGE));

  assert.equal(result.status, "retryable");
  assert.equal(result.errorDetail, "No usable analysis from 1 batch(es)");
  assert.deepEqual(result.output, {});
});
