import test from "node:test";
import assert from "node:assert/strict";
import type { Document } from "@jobpulse/types";
import { FakeLLM, jobRecord, pipelineResponder, stageContext } from "../testing/fakes.js";
import { MARKET_REPORT_STAGE, createMarketReportStage } from "./market-report.js";

const jobData = [
  jobRecord({ title: "AI Engineer", company: "Northwind", location: "Toronto", salaryText: "120K a year", remote: true }),
  jobRecord({ title: "Data Engineer", company: "Contoso", location: "Vancouver" }),
];

const documents: Document[] = [
  { id: "job:1", text: "AI Engineer at Northwind (Toronto)\nBuild agents.", metadata: { kind: "job" } },
  { id: "tech", text: "Technology requirements summary.", metadata: { kind: "tech-analysis" } },
];

function state() {
  return { fields: { jobData }, error: null, control: { forceRestart: false } };
}

test("marketReport gives identical output for identical state and documents", async () => {
  const llm = new FakeLLM(pipelineResponder);
  const stage = createMarketReportStage({ llm });
  const input = state();
  const inputBefore = structuredClone(input);
  const documentsBefore = structuredClone(documents);

  const first = await stage.run(input, documents, stageContext(MARKET_REPORT_STAGE));
  const second = await stage.run(input, documents, stageContext(MARKET_REPORT_STAGE));

  assert.equal(first.status, "success");
  assert.deepEqual(second.output, first.output);
  assert.deepEqual(second.documents, first.documents);
  assert.equal(llm.prompts[1], llm.prompts[0]);
  assert.deepEqual(first.output.marketReport?.sourceDocuments, ["job:1", "tech"]);
  assert.deepEqual(input, inputBefore);
  assert.deepEqual(documents, documentsBefore);
});

test("marketReport asks for a retry when the insights are unusable", async () => {
  const stage = createMarketReportStage({ llm: new FakeLLM(() => "not json") });

  const result = await stage.run(state(), documents, stageContext(MARKET_REPORT_STAGE));

  assert.equal(result.status, "retryable");
  assert.deepEqual(result.output, {});
});
