// ──────────────────────────────────────────────
// JobPulse - Job Market Workflow State
// ──────────────────────────────────────────────

import { z } from "zod";
import type { StateCodec } from "@jobpulse/types";

export const jobRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  description: z.string(),
  salaryText: z.string().nullable(),
  scheduleType: z.string().nullable(),
  remote: z.boolean(),
  postedAt: z.string().nullable(),
  via: z.string().nullable(),
  searchRole: z.string(),
  searchLocation: z.string(),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;

const countsSchema = z.record(z.number());

export const techAnalysisSchema = z.object({
  technicalSkills: countsSchema,
  techStacks: countsSchema,
  emergingTrends: z.array(z.string()),
  educationRequirements: countsSchema,
  batchesAnalyzed: z.number().int().nonnegative(),
  batchesSkipped: z.number().int().nonnegative(),
});

export type TechAnalysis = z.infer<typeof techAnalysisSchema>;

export const salaryStatisticsSchema = z.object({
  sampleSize: z.number().int().nonnegative(),
  average: z.number(),
  median: z.number(),
  min: z.number(),
  max: z.number(),
});

export type SalaryStatistics = z.infer<typeof salaryStatisticsSchema>;

const rankedCountSchema = z.object({ name: z.string(), count: z.number() });

export type RankedCount = z.infer<typeof rankedCountSchema>;

export const marketInsightsSchema = z.object({
  salaryTrends: z.string(),
  locationAnalysis: z.string(),
  companyInsights: z.string(),
  remoteWorkTrends: z.string(),
  marketDemands: z.string(),
  industryTrends: z.string(),
});

export type MarketInsights = z.infer<typeof marketInsightsSchema>;

export const marketReportSchema = z.object({
  salaryStatistics: salaryStatisticsSchema,
  topLocations: z.array(rankedCountSchema),
  topCompanies: z.array(rankedCountSchema),
  remotePercentage: z.number(),
  insights: marketInsightsSchema,
  sourceDocuments: z.array(z.string()),
});

export type MarketReport = z.infer<typeof marketReportSchema>;

export const aiImpactInsightsSchema = z.object({
  aiSkillRequirements: z.string(),
  jobEvolution: z.string(),
  toolAdoption: z.string(),
  industryImpact: z.string(),
  futureTrends: z.string(),
});

export type AiImpactInsights = z.infer<typeof aiImpactInsightsSchema>;

export const aiImpactSchema = z.object({
  aiRoleCount: z.number().int().nonnegative(),
  aiRolePercentage: z.number(),
  keywordCounts: countsSchema,
  insights: aiImpactInsightsSchema,
  sourceDocuments: z.array(z.string()),
});

export type AiImpact = z.infer<typeof aiImpactSchema>;

export const reportSectionsSchema = z.object({
  executiveSummary: z.string(),
  technicalLandscape: z.string(),
  marketDynamics: z.string(),
  aiImpactAssessment: z.string(),
  recommendations: z.string(),
});

export type ReportSections = z.infer<typeof reportSectionsSchema>;

export const finalReportSchema = z.object({
  statistics: z.object({
    totalJobs: z.number().int().nonnegative(),
    aiRoles: z.number().int().nonnegative(),
    aiRolePercentage: z.number(),
    remotePercentage: z.number(),
    topSkills: z.array(rankedCountSchema),
    salary: salaryStatisticsSchema,
  }),
  sections: reportSectionsSchema,
});

export type FinalReport = z.infer<typeof finalReportSchema>;

export const jobMarketFieldsSchema = z.object({
  jobData: z.array(jobRecordSchema),
  techAnalysis: techAnalysisSchema,
  marketReport: marketReportSchema,
  aiImpact: aiImpactSchema,
  finalReport: finalReportSchema,
});

export type JobMarketFields = z.infer<typeof jobMarketFieldsSchema>;

const partialFieldsSchema = jobMarketFieldsSchema.partial();

export const jobMarketCodec: StateCodec<JobMarketFields> = {
  parse: (raw) => partialFieldsSchema.parse(raw),
};
