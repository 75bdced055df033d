// ──────────────────────────────────────────────
// JobPulse - Job Collection
// Walks the role × location search plan and normalises results
// ──────────────────────────────────────────────

import type { StageLogger } from "@jobpulse/types";
import { sanitizeErrorMessage, sleep } from "@jobpulse/utils";
import type { JobSearchSource, RawJobResult } from "./serpapi-client.js";
import type { JobRecord } from "./state.js";

export interface SearchPlan {
  roles: readonly string[];
  locations: readonly string[];
}

export const DEFAULT_SEARCH_PLAN: SearchPlan = {
  roles: [
    "Software Engineer",
    "AI Engineer",
    "Machine Learning Engineer",
    "Data Scientist",
    "DevOps Engineer",
    "Cloud Engineer",
    "Full Stack Developer",
    "Backend Engineer",
    "Frontend Engineer",
    "Computer Vision Engineer",
    "UI/UX Designer",
    "AI Product Manager",
  ],
  locations: [
    "United States",
    "Canada",
    "United Kingdom",
    "Europe",
    "Asia",
    "Australia",
    "New Zealand",
    "Middle East",
    "South America",
  ],
};

export interface CollectOptions {
  delayMs: number;
  logger: StageLogger;
  signal?: AbortSignal;
}

export function jobKey(raw: Pick<RawJobResult, "company_name" | "title" | "location">): string {
  return `${raw.company_name ?? ""}_${raw.title ?? ""}_${raw.location ?? ""}`;
}

export function normalizeJob(raw: RawJobResult, searchRole: string, searchLocation: string): JobRecord {
  const location = raw.location?.trim() || "Unknown Location";
  const extensions = raw.detected_extensions;

  return {
    id: jobKey(raw),
    title: raw.title?.trim() || "Unknown Title",
    company: raw.company_name?.trim() || "Unknown Company",
    location,
    description: raw.description?.trim() || "No description available",
    salaryText: extensions?.salary ?? null,
    scheduleType: extensions?.schedule_type ?? null,
    remote: extensions?.work_from_home === true || /\bremote\b|anywhere/i.test(location),
    postedAt: extensions?.posted_at ?? null,
    via: raw.via ?? null,
    searchRole,
    searchLocation,
  };
}

/**
 * Runs every role/location query in order. A failing query is logged and
 * skipped; jobs seen under an earlier query are dropped by their
 * company/title/location key.
 */
export async function collectJobs(
  source: JobSearchSource,
  plan: SearchPlan,
  options: CollectOptions
): Promise<JobRecord[]> {
  const { logger, signal } = options;
  const jobs: JobRecord[] = [];
  const seen = new Set<string>();
  let queries = 0;

  for (const role of plan.roles) {
    for (const location of plan.locations) {
      if (signal?.aborted) {
        logger.warn("Job collection cancelled", { collected: jobs.length });
        return jobs;
      }
      if (queries > 0 && options.delayMs > 0) {
        await sleep(options.delayMs);
      }
      queries++;

      try {
        const results = await source.search(role, location, signal);
        let added = 0;
        for (const raw of results) {
          const key = jobKey(raw);
          if (seen.has(key)) continue;
          seen.add(key);
          jobs.push(normalizeJob(raw, role, location));
          added++;
        }
        logger.info("Search completed", { role, location, results: results.length, added, total: jobs.length });
      } catch (err) {
        logger.error("Search failed", { role, location, error: sanitizeErrorMessage(err) });
      }
    }
  }

  logger.info("Job collection finished", { queries, jobs: jobs.length });
  return jobs;
}
