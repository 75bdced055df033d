// ──────────────────────────────────────────────
// JobPulse - Tech Requirements Analysis Stage
// ──────────────────────────────────────────────

import { z } from "zod";
import type { LLMProvider, NewDocument, StageDefinition } from "@jobpulse/types";
import { retry, succeed } from "@jobpulse/engine";
import { contentId } from "@jobpulse/utils";
import { generateStructured } from "../llm-json.js";
import { sortCounts } from "../salary.js";
import type { JobMarketFields, JobRecord, TechAnalysis } from "../state.js";

export const ANALYZE_TECH_STAGE = "analyzeTech";
export const TECH_BATCH_SIZE = 20;
export const DESCRIPTION_PREVIEW_CHARS = 500;

const batchAnalysisSchema = z.object({
  technical_skills: z.record(z.number()).default({}),
  tech_stacks: z.record(z.number()).default({}),
  emerging_trends: z.array(z.string()).default([]),
  education_requirements: z.record(z.number()).default({}),
});

type BatchAnalysis = z.infer<typeof batchAnalysisSchema>;

const SYSTEM_PROMPT = `You are a technology requirements analyzer. Identify in the job postings:
1. Required technical skills and tools
2. Common technology stacks
3. Emerging technology trends
4. Education and certification requirements

Answer with a JSON object of this shape:
{
  "technical_skills": {"skill_name": frequency_count},
  "tech_stacks": {"stack_name": frequency_count},
  "emerging_trends": ["trend"],
  "education_requirements": {"requirement": frequency_count}
}`;

export function previewDescription(description: string): string {
  return description.length > DESCRIPTION_PREVIEW_CHARS
    ? `${description.slice(0, DESCRIPTION_PREVIEW_CHARS)}...`
    : description;
}

export function batchJobs<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export function buildBatchPrompt(batch: readonly JobRecord[]): string {
  const simplified = batch.map((job) => ({
    title: job.title,
    company: job.company,
    description: previewDescription(job.description),
  }));
  return `Analyze these job postings and provide insights about technology requirements: ${JSON.stringify(simplified)}`;
}

function addCounts(target: Record<string, number>, source: Readonly<Record<string, number>>): void {
  for (const [name, count] of Object.entries(source)) {
    target[name] = (target[name] ?? 0) + count;
  }
}

function sortedRecord(counts: Readonly<Record<string, number>>): Record<string, number> {
  return Object.fromEntries(sortCounts(counts).map(({ name, count }) => [name, count]));
}

export function mergeBatchAnalyses(analyses: readonly BatchAnalysis[], skipped: number): TechAnalysis {
  const skills: Record<string, number> = {};
  const stacks: Record<string, number> = {};
  const education: Record<string, number> = {};
  const trends = new Set<string>();

  for (const analysis of analyses) {
    addCounts(skills, analysis.technical_skills);
    addCounts(stacks, analysis.tech_stacks);
    addCounts(education, analysis.education_requirements);
    for (const trend of analysis.emerging_trends) {
      trends.add(trend);
    }
  }

  return {
    technicalSkills: sortedRecord(skills),
    techStacks: sortedRecord(stacks),
    emergingTrends: [...trends],
    educationRequirements: sortedRecord(education),
    batchesAnalyzed: analyses.length,
    batchesSkipped: skipped,
  };
}

export function techSummaryDocument(analysis: TechAnalysis): NewDocument {
  const top = (counts: Record<string, number>) =>
    sortCounts(counts)
      .slice(0, 10)
      .map(({ name, count }) => `${name} (${count})`)
      .join(", ");

  const text = [
    "Technology requirements summary.",
    `Top technical skills: ${top(analysis.technicalSkills) || "none"}.`,
    `Common tech stacks: ${top(analysis.techStacks) || "none"}.`,
    `Emerging trends: ${analysis.emergingTrends.join(", ") || "none"}.`,
    `Education requirements: ${top(analysis.educationRequirements) || "none"}.`,
  ].join("\n");

  return { id: contentId("tech-analysis", text), text, metadata: { kind: "tech-analysis" } };
}

export function createAnalyzeTechStage(deps: { llm: LLMProvider }): StageDefinition<JobMarketFields> {
  return {
    name: ANALYZE_TECH_STAGE,
    owns: ["techAnalysis"],
    reads: ["jobData"],
    run: async (state, _documents, context) => {
      const jobs = state.fields.jobData ?? [];
      const batches = batchJobs(jobs, TECH_BATCH_SIZE);
      const analyses: BatchAnalysis[] = [];
      let skipped = 0;

      for (const [index, batch] of batches.entries()) {
        context.logger.info("Analyzing batch", { batch: index + 1, of: batches.length, jobs: batch.length });
        const answer = await generateStructured(deps.llm, buildBatchPrompt(batch), batchAnalysisSchema, {
          systemPrompt: SYSTEM_PROMPT,
        });
        if (answer.success) {
          analyses.push(answer.data);
        } else {
          skipped++;
          context.logger.warn("Skipping batch with unusable analysis", { batch: index + 1, error: answer.error });
        }
      }

      if (analyses.length === 0) {
        return retry(`No usable analysis from ${batches.length} batch(es)`);
      }

      const techAnalysis = mergeBatchAnalyses(analyses, skipped);
      return succeed<JobMarketFields>({ techAnalysis }, [techSummaryDocument(techAnalysis)]);
    },
  };
}
