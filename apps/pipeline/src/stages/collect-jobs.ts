// ──────────────────────────────────────────────
// JobPulse - Collect Jobs Stage
// ──────────────────────────────────────────────

import type { NewDocument, StageDefinition } from "@jobpulse/types";
import { fail, retry, succeed } from "@jobpulse/engine";
import { contentId, truncateString } from "@jobpulse/utils";
import { collectJobs, DEFAULT_SEARCH_PLAN, type SearchPlan } from "../job-collector.js";
import type { JobCache } from "../job-cache.js";
import type { JobSearchSource } from "../serpapi-client.js";
import type { JobMarketFields, JobRecord } from "../state.js";

export const COLLECT_JOBS_STAGE = "collectJobs";

const MAX_DOCUMENT_CHARS = 4000;

export interface CollectJobsDependencies {
  source: JobSearchSource;
  cache: JobCache;
  plan?: SearchPlan;
  requestDelayMs?: number;
}

export function jobDocument(job: JobRecord): NewDocument {
  const header = `${job.title} at ${job.company} (${job.location})`;
  const salary = job.salaryText ? `\nSalary: ${job.salaryText}` : "";
  const text = truncateString(`${header}${salary}\n${job.description}`, MAX_DOCUMENT_CHARS);
  // Content-addressed: a re-collected posting with a new description is a new document
  return {
    id: contentId("job", text),
    text,
    metadata: {
      kind: "job",
      jobId: job.id,
      title: job.title,
      company: job.company,
      location: job.location,
      remote: job.remote ? "true" : "false",
    },
  };
}

export function createCollectJobsStage(deps: CollectJobsDependencies): StageDefinition<JobMarketFields> {
  return {
    name: COLLECT_JOBS_STAGE,
    owns: ["jobData"],
    run: async (state, _documents, context) => {
      let jobs = state.control.forceRestart ? null : await deps.cache.load();

      if (jobs) {
        context.logger.info("Using cached job data", { jobs: jobs.length });
      } else {
        jobs = await collectJobs(deps.source, deps.plan ?? DEFAULT_SEARCH_PLAN, {
          delayMs: deps.requestDelayMs ?? 0,
          logger: context.logger,
          signal: context.signal,
        });
        // A partial collection must not reach the cache or the checkpoint
        if (context.signal.aborted) {
          return retry(`Job collection cancelled after ${jobs.length} job(s)`);
        }
        if (jobs.length > 0) {
          await deps.cache.save(jobs);
        }
      }

      if (jobs.length === 0) {
        return fail("No job postings could be collected");
      }

      return succeed<JobMarketFields>({ jobData: jobs }, jobs.map(jobDocument));
    },
  };
}
