// ──────────────────────────────────────────────
// JobPulse - AI Impact Stage
// ──────────────────────────────────────────────

import type { LLMProvider, StageDefinition } from "@jobpulse/types";
import { retry, succeed } from "@jobpulse/engine";
import { tokenize } from "@jobpulse/utils";
import { generateStructured, renderDocumentContext } from "../llm-json.js";
import { percentage, sortCounts } from "../salary.js";
import { aiImpactInsightsSchema, type AiImpact, type JobMarketFields, type JobRecord } from "../state.js";

export const AI_IMPACT_STAGE = "aiImpact";

export const AI_KEYWORDS = [
  "ai",
  "artificial intelligence",
  "machine learning",
  "ml",
  "deep learning",
  "llm",
  "nlp",
  "computer vision",
  "generative",
  "data scientist",
] as const;

const SYSTEM_PROMPT = "You are an analyst of how AI is changing the job market.";

export function mentions(tokens: readonly string[], phrase: string): boolean {
  const needle = tokenize(phrase);
  if (needle.length === 0 || needle.length > tokens.length) return false;
  for (let start = 0; start + needle.length <= tokens.length; start++) {
    if (needle.every((token, offset) => tokens[start + offset] === token)) {
      return true;
    }
  }
  return false;
}

export function isAiRole(job: Pick<JobRecord, "title">): boolean {
  const tokens = tokenize(job.title);
  return AI_KEYWORDS.some((keyword) => mentions(tokens, keyword));
}

/** Postings mentioning each keyword in title or description. */
export function countAiKeywords(jobs: readonly JobRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const job of jobs) {
    const tokens = tokenize(`${job.title} ${job.description}`);
    for (const keyword of AI_KEYWORDS) {
      if (mentions(tokens, keyword)) {
        counts[keyword] = (counts[keyword] ?? 0) + 1;
      }
    }
  }
  return Object.fromEntries(sortCounts(counts).map(({ name, count }) => [name, count]));
}

export function createAiImpactStage(deps: { llm: LLMProvider; topK?: number }): StageDefinition<JobMarketFields> {
  return {
    name: AI_IMPACT_STAGE,
    owns: ["aiImpact"],
    reads: ["jobData", "techAnalysis"],
    retrieval: {
      queryTemplate: "AI machine learning LLM automation skills tools {{techAnalysis.emergingTrends}}",
      mode: "hybrid",
      topK: deps.topK ?? 12,
    },
    run: async (state, documents, context) => {
      const jobs = state.fields.jobData ?? [];
      const aiRoleCount = jobs.filter(isAiRole).length;
      const keywordCounts = countAiKeywords(jobs);
      const trends = state.fields.techAnalysis?.emergingTrends ?? [];

      const prompt = `Assess the impact of AI on this job market.

Postings analysed: ${jobs.length}
AI-specific roles: ${aiRoleCount}
Keyword mentions: ${JSON.stringify(keywordCounts)}
Emerging trends: ${trends.join(", ") || "unknown"}

Relevant postings:
${renderDocumentContext(documents)}

Answer with a JSON object with these string fields:
{
  "aiSkillRequirements": "AI/ML frameworks, experience levels, specialised and non-technical skills",
  "jobEvolution": "traditional roles adopting AI, new AI titles, automation impact",
  "toolAdoption": "popular frameworks, cloud AI services, development tools",
  "industryImpact": "industry adoption, workflow transformation, challenges",
  "futureTrends": "emerging technologies and future skill requirements"
}`;

      const answer = await generateStructured(deps.llm, prompt, aiImpactInsightsSchema, { systemPrompt: SYSTEM_PROMPT });
      if (!answer.success) {
        context.logger.warn("AI impact insights unusable", { error: answer.error });
        return retry(answer.error);
      }

      const aiImpact: AiImpact = {
        aiRoleCount,
        aiRolePercentage: percentage(aiRoleCount, jobs.length),
        keywordCounts,
        insights: answer.data,
        sourceDocuments: documents.map((doc) => doc.id),
      };
      return succeed<JobMarketFields>({ aiImpact });
    },
  };
}
