// ──────────────────────────────────────────────
// JobPulse - Market Report Stage
// Salary statistics plus retrieval-grounded market insights
// ──────────────────────────────────────────────

import type { LLMProvider, NewDocument, StageDefinition } from "@jobpulse/types";
import { retry, succeed } from "@jobpulse/engine";
import { contentId } from "@jobpulse/utils";
import { generateStructured, renderDocumentContext } from "../llm-json.js";
import { parseSalary, percentage, rankCounts, salaryStatistics, sortCounts } from "../salary.js";
import {
  marketInsightsSchema,
  type JobMarketFields,
  type JobRecord,
  type MarketReport,
  type TechAnalysis,
} from "../state.js";

export const MARKET_REPORT_STAGE = "marketReport";

const TOP_LIMIT = 10;

const SYSTEM_PROMPT = "You are a job market analyst. Ground every statement in the postings and figures you are given.";

export function marketStatistics(jobs: readonly JobRecord[]): Omit<MarketReport, "insights" | "sourceDocuments"> {
  const salaries: number[] = [];
  for (const job of jobs) {
    const salary = parseSalary(job.salaryText);
    if (salary !== null) salaries.push(salary);
  }

  return {
    salaryStatistics: salaryStatistics(salaries),
    topLocations: rankCounts(
      jobs.map((job) => job.location),
      TOP_LIMIT
    ),
    topCompanies: rankCounts(
      jobs.map((job) => job.company),
      TOP_LIMIT
    ),
    remotePercentage: percentage(jobs.filter((job) => job.remote).length, jobs.length),
  };
}

function buildPrompt(
  statistics: ReturnType<typeof marketStatistics>,
  techAnalysis: TechAnalysis | undefined,
  context: string
): string {
  const skills = sortCounts(techAnalysis?.technicalSkills ?? {})
    .slice(0, TOP_LIMIT)
    .map(({ name, count }) => `${name}: ${count}`)
    .join(", ");

  return `Analyze the job market using the statistics and postings below.

Salary statistics (annualised): ${JSON.stringify(statistics.salaryStatistics)}
Top locations: ${JSON.stringify(statistics.topLocations)}
Top companies: ${JSON.stringify(statistics.topCompanies)}
Remote share: ${statistics.remotePercentage}%
In-demand skills: ${skills || "unknown"}

Relevant postings:
${context}

Answer with a JSON object with these string fields:
{
  "salaryTrends": "salary ranges by experience, industry and location",
  "locationAnalysis": "top hiring locations and regional differences",
  "companyInsights": "top hiring companies, sizes and sectors",
  "remoteWorkTrends": "remote and hybrid share and restrictions",
  "marketDemands": "high-demand skills, emerging roles, experience levels",
  "industryTrends": "growing sectors and transforming roles"
}`;
}

export function marketSummaryDocument(report: MarketReport): NewDocument {
  const stats = report.salaryStatistics;
  const text = [
    "Market report summary.",
    `Salary sample of ${stats.sampleSize}: average ${stats.average}, median ${stats.median}, range ${stats.min}-${stats.max}.`,
    `Top locations: ${report.topLocations.map(({ name, count }) => `${name} (${count})`).join(", ") || "none"}.`,
    `Remote share: ${report.remotePercentage}%.`,
    `Market demands: ${report.insights.marketDemands}`,
  ].join("\n");

  return { id: contentId("market-report", text), text, metadata: { kind: "market-report" } };
}

export function createMarketReportStage(deps: { llm: LLMProvider; topK?: number }): StageDefinition<JobMarketFields> {
  return {
    name: MARKET_REPORT_STAGE,
    owns: ["marketReport"],
    reads: ["jobData", "techAnalysis"],
    retrieval: {
      queryTemplate: "salary compensation hiring companies locations remote work demand {{techAnalysis.emergingTrends}}",
      mode: "hybrid",
      topK: deps.topK ?? 12,
    },
    run: async (state, documents, context) => {
      const statistics = marketStatistics(state.fields.jobData ?? []);
      const prompt = buildPrompt(statistics, state.fields.techAnalysis, renderDocumentContext(documents));

      const answer = await generateStructured(deps.llm, prompt, marketInsightsSchema, { systemPrompt: SYSTEM_PROMPT });
      if (!answer.success) {
        context.logger.warn("Market insights unusable", { error: answer.error });
        return retry(answer.error);
      }

      const marketReport: MarketReport = {
        ...statistics,
        insights: answer.data,
        sourceDocuments: documents.map((doc) => doc.id),
      };
      return succeed<JobMarketFields>({ marketReport }, [marketSummaryDocument(marketReport)]);
    },
  };
}
