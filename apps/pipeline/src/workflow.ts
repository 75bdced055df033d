// ──────────────────────────────────────────────
// JobPulse - Job Market Analysis Workflow
// collect → analyze → [market report | AI impact] → final report
// ──────────────────────────────────────────────

import type { LLMProvider, WorkflowDefinition } from "@jobpulse/types";
import { END } from "@jobpulse/types";
import type { JobCache } from "./job-cache.js";
import type { SearchPlan } from "./job-collector.js";
import type { JobSearchSource } from "./serpapi-client.js";
import { jobMarketCodec, type JobMarketFields } from "./state.js";
import { COLLECT_JOBS_STAGE, createCollectJobsStage } from "./stages/collect-jobs.js";
import { ANALYZE_TECH_STAGE, createAnalyzeTechStage } from "./stages/analyze-tech.js";
import { MARKET_REPORT_STAGE, createMarketReportStage } from "./stages/market-report.js";
import { AI_IMPACT_STAGE, createAiImpactStage } from "./stages/ai-impact.js";
import { FINAL_REPORT_STAGE, createFinalReportStage } from "./stages/final-report.js";

export const JOB_MARKET_WORKFLOW = "job-market-analysis";

export interface JobMarketDependencies {
  llm: LLMProvider;
  source: JobSearchSource;
  cache: JobCache;
  plan?: SearchPlan;
  requestDelayMs?: number;
}

export function buildJobMarketWorkflow(deps: JobMarketDependencies): WorkflowDefinition<JobMarketFields> {
  return {
    name: JOB_MARKET_WORKFLOW,
    start: COLLECT_JOBS_STAGE,
    codec: jobMarketCodec,
    stages: [
      createCollectJobsStage(deps),
      createAnalyzeTechStage(deps),
      createMarketReportStage(deps),
      createAiImpactStage(deps),
      createFinalReportStage(deps),
    ],
    edges: [
      { from: COLLECT_JOBS_STAGE, to: ANALYZE_TECH_STAGE, label: "collected" },
      {
        from: ANALYZE_TECH_STAGE,
        fanOut: [MARKET_REPORT_STAGE, AI_IMPACT_STAGE],
        join: FINAL_REPORT_STAGE,
        label: "market and AI impact",
      },
      { from: FINAL_REPORT_STAGE, to: END, label: "reported" },
    ],
  };
}
