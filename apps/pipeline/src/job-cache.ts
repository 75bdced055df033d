// ──────────────────────────────────────────────
// JobPulse - Collected Job Cache
// ──────────────────────────────────────────────

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { createLogger, safeJsonParse, sanitizeErrorMessage } from "@jobpulse/utils";
import { jobRecordSchema, type JobRecord } from "./state.js";

const logger = createLogger("job-cache");

const cachedJobsSchema = z.array(jobRecordSchema);

export const JOB_CACHE_FILE = "job_data.json";

export interface JobCache {
  load(): Promise<JobRecord[] | null>;
  save(jobs: readonly JobRecord[]): Promise<void>;
}

export class FileJobCache implements JobCache {
  readonly path: string;

  constructor(dataDir: string) {
    this.path = join(dataDir, JOB_CACHE_FILE);
  }

  /** Null when there is no usable cache; an unreadable file means collecting afresh. */
  async load(): Promise<JobRecord[] | null> {
    let contents: string;
    try {
      contents = await readFile(this.path, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        logger.info({ path: this.path }, "No cached job data found");
      } else {
        logger.warn({ path: this.path, error: sanitizeErrorMessage(err) }, "Failed to read cached job data");
      }
      return null;
    }

    const json = safeJsonParse(contents);
    if (!json.success) {
      logger.warn({ path: this.path, error: json.error }, "Cached job data is not valid JSON, collecting afresh");
      return null;
    }

    const parsed = cachedJobsSchema.safeParse(json.data);
    if (!parsed.success) {
      logger.warn({ path: this.path, issues: parsed.error.issues.length }, "Cached job data has an unexpected shape, collecting afresh");
      return null;
    }

    logger.info({ path: this.path, jobs: parsed.data.length }, "Loaded cached job data");
    return parsed.data;
  }

  async save(jobs: readonly JobRecord[]): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.tmp`;
    await writeFile(tempPath, JSON.stringify(jobs, null, 2), "utf8");
    await rename(tempPath, this.path);
    logger.info({ path: this.path, jobs: jobs.length }, "Saved job data");
  }
}
