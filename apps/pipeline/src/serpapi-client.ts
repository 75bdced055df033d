// ──────────────────────────────────────────────
// JobPulse - SerpAPI Google Jobs Client
// ──────────────────────────────────────────────

import { z } from "zod";
import { StageFailure, sanitizeErrorMessage } from "@jobpulse/utils";

export const SERPAPI_ENDPOINT = "https://serpapi.com/search.json";

const rawJobSchema = z.object({
  title: z.string().optional(),
  company_name: z.string().optional(),
  location: z.string().optional(),
  description: z.string().optional(),
  via: z.string().optional(),
  extensions: z.array(z.string()).optional(),
  detected_extensions: z
    .object({
      salary: z.string().optional(),
      schedule_type: z.string().optional(),
      work_from_home: z.boolean().optional(),
      posted_at: z.string().optional(),
    })
    .optional(),
});

export type RawJobResult = z.infer<typeof rawJobSchema>;

const searchResponseSchema = z.object({
  jobs_results: z.array(rawJobSchema).optional(),
  error: z.string().optional(),
});

export interface JobSearchSource {
  search(role: string, location: string, signal?: AbortSignal): Promise<RawJobResult[]>;
}

export class SerpApiClient implements JobSearchSource {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs = 30000
  ) {}

  async search(role: string, location: string, signal?: AbortSignal): Promise<RawJobResult[]> {
    const url = new URL(SERPAPI_ENDPOINT);
    url.searchParams.set("engine", "google_jobs");
    url.searchParams.set("q", role);
    url.searchParams.set("location", location);
    url.searchParams.set("hl", "en");
    url.searchParams.set("api_key", this.apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        const body = await response.text().catch(() => "Unknown error");
        throw new StageFailure(`SerpAPI request failed with status ${response.status}: ${body}`, {
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new StageFailure("SerpAPI returned an unexpected response shape");
      }
      // "no results" comes back as an error string with a 200 status
      return parsed.data.jobs_results ?? [];
    } catch (err) {
      if (err instanceof StageFailure) throw err;
      throw new StageFailure(`SerpAPI request failed: ${sanitizeErrorMessage(err)}`, { retryable: true, cause: err });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
