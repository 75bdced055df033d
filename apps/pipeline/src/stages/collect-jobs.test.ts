import test from "node:test";
import assert from "node:assert/strict";
import { contentId } from "@jobpulse/utils";
import { FakeJobSearch, MemoryJobCache, jobRecord, stageContext } from "../testing/fakes.js";
import { COLLECT_JOBS_STAGE, createCollectJobsStage, jobDocument } from "./collect-jobs.js";

const plan = { roles: ["Cloud Engineer"], locations: ["Australia"] };
const cached = [jobRecord({ title: "Cloud Engineer", company: "Woodgrove", location: "Sydney" })];

function state(forceRestart: boolean) {
  return { fields: {}, error: null, control: { forceRestart } };
}

test("jobDocument is content-addressed and tagged as a job", () => {
  const doc = jobDocument(
    jobRecord({ title: "SRE", company: "Acme", location: "Oslo", salaryText: "90K a year", description: "Keep it up." })
  );
  const text = "SRE at Acme (Oslo)\nSalary: 90K a year\nKeep it up.";
  assert.equal(doc.text, text);
  assert.equal(doc.id, contentId("job", text));
  assert.deepEqual(doc.metadata, {
    kind: "job",
    jobId: "Acme_SRE_Oslo",
    title: "SRE",
    company: "Acme",
    location: "Oslo",
    remote: "false",
  });
});

test("collectJobs reuses cached postings unless a restart is forced", async () => {
  const source = new FakeJobSearch({
    "Cloud Engineer|Australia": [{ title: "Cloud Engineer", company_name: "Litware", location: "Perth" }],
  });
  const cache = new MemoryJobCache(cached);
  const stage = createCollectJobsStage({ source, cache, plan });

  const reused = await stage.run(state(false), [], stageContext(COLLECT_JOBS_STAGE));
  assert.deepEqual(reused.output.jobData, cached);
  assert.deepEqual(source.queries, []);

  const fresh = await stage.run(state(true), [], stageContext(COLLECT_JOBS_STAGE));
  assert.deepEqual(
    fresh.output.jobData?.map((job) => job.company),
    ["Litware"]
  );
  assert.deepEqual(source.queries, ["Cloud Engineer|Australia"]);
  assert.deepEqual(
    cache.saved?.map((job) => job.company),
    ["Litware"]
  );
  assert.equal(fresh.documents?.length, 1);
});

test("collectJobs is fatal when nothing was collected", async () => {
  const cache = new MemoryJobCache();
  const stage = createCollectJobsStage({ source: new FakeJobSearch({}), cache, plan });

  const result = await stage.run(state(false), [], stageContext(COLLECT_JOBS_STAGE));

  assert.equal(result.status, "fatal");
  assert.equal(result.errorDetail, "No job postings could be collected");
  assert.equal(cache.saved, null);
});

test("collectJobs asks for a retry and caches nothing once the run is aborted", async () => {
  const source = new FakeJobSearch({
    "Cloud Engineer|Australia": [{ title: "Cloud Engineer", company_name: "Litware", location: "Perth" }],
  });
  const cache = new MemoryJobCache();
  const stage = createCollectJobsStage({ source, cache, plan });

  const result = await stage.run(state(false), [], {
    ...stageContext(COLLECT_JOBS_STAGE),
    signal: AbortSignal.abort(),
  });

  assert.equal(result.status, "retryable");
  assert.equal(result.errorDetail, "Job collection cancelled after 0 job(s)");
  assert.deepEqual(result.output, {});
  assert.deepEqual(source.queries, []);
  assert.equal(cache.saved, null);
});
