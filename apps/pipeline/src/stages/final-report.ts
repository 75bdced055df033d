// ──────────────────────────────────────────────
// JobPulse - Final Report Stage
// ──────────────────────────────────────────────

import type { LLMProvider, StageDefinition } from "@jobpulse/types";
import { fail, retry, succeed } from "@jobpulse/engine";
import { generateStructured, renderDocumentContext } from "../llm-json.js";
import { sortCounts } from "../salary.js";
import { reportSectionsSchema, type FinalReport, type JobMarketFields } from "../state.js";

export const FINAL_REPORT_STAGE = "finalReport";

const SYSTEM_PROMPT = "You are a career strategist writing a concise, data-driven job market report in markdown.";

export function reportStatistics(fields: Partial<JobMarketFields>): FinalReport["statistics"] | null {
  const { jobData, techAnalysis, marketReport, aiImpact } = fields;
  if (!jobData || !techAnalysis || !marketReport || !aiImpact) return null;

  return {
    totalJobs: jobData.length,
    aiRoles: aiImpact.aiRoleCount,
    aiRolePercentage: aiImpact.aiRolePercentage,
    remotePercentage: marketReport.remotePercentage,
    topSkills: sortCounts(techAnalysis.technicalSkills).slice(0, 10),
    salary: marketReport.salaryStatistics,
  };
}

export function createFinalReportStage(deps: { llm: LLMProvider; topK?: number }): StageDefinition<JobMarketFields> {
  return {
    name: FINAL_REPORT_STAGE,
    owns: ["finalReport"],
    reads: ["jobData", "techAnalysis", "marketReport", "aiImpact"],
    retrieval: {
      queryTemplate: "job market outlook AI skills salary trends {{techAnalysis.emergingTrends}}",
      mode: "hybrid",
      topK: deps.topK ?? 8,
    },
    run: async (state, documents, context) => {
      const statistics = reportStatistics(state.fields);
      const { marketReport, aiImpact } = state.fields;
      if (!statistics || !marketReport || !aiImpact) {
        return fail("Final report needs job data, tech analysis, market report and AI impact");
      }

      const prompt = `Write the sections of a job market analysis report.

Key statistics: ${JSON.stringify(statistics)}
Market insights: ${JSON.stringify(marketReport.insights)}
AI impact insights: ${JSON.stringify(aiImpact.insights)}

Supporting material:
${renderDocumentContext(documents)}

Answer with a JSON object whose values are markdown bullet lists:
{
  "executiveSummary": "market overview, technology impact and strategic direction",
  "technicalLandscape": "most in-demand skills, emerging technologies, skill gaps",
  "marketDynamics": "salary trends, geographic insights, industry highlights",
  "aiImpactAssessment": "current AI adoption, future projections, skill shifts",
  "recommendations": "two actions each for job seekers, employers and educators"
}`;

      const answer = await generateStructured(deps.llm, prompt, reportSectionsSchema, { systemPrompt: SYSTEM_PROMPT });
      if (!answer.success) {
        context.logger.warn("Report sections unusable", { error: answer.error });
        return retry(answer.error);
      }

      const finalReport: FinalReport = { statistics, sections: answer.data };
      return succeed<JobMarketFields>({ finalReport });
    },
  };
}
