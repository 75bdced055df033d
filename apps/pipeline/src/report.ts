// ──────────────────────────────────────────────
// JobPulse - Report Rendering
// ──────────────────────────────────────────────

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { WorkflowState } from "@jobpulse/types";
import { createLogger } from "@jobpulse/utils";
import type { FinalReport, JobMarketFields, RankedCount } from "./state.js";

const logger = createLogger("report");

export const REPORT_FILE = "job_market_report.md";
export const STATE_FILE = "workflow_state.json";

function formatAmount(value: number): string {
  return `$${Math.round(value).toLocaleString("en-US")}`;
}

function formatRanking(items: readonly RankedCount[]): string {
  if (items.length === 0) return "_No data_";
  return items.map((item, index) => `${index + 1}. ${item.name} (${item.count})`).join("\n");
}

export function renderMarkdownReport(report: FinalReport, generatedAt: string): string {
  const { statistics, sections } = report;
  const salary = statistics.salary;
  const salaryLine =
    salary.sampleSize === 0
      ? "- Salary: no postings with parseable salaries"
      : `- Salary (${salary.sampleSize} postings): average ${formatAmount(salary.average)}, ` +
        `median ${formatAmount(salary.median)}, range ${formatAmount(salary.min)} - ${formatAmount(salary.max)}`;

  return [
    "# Job Market Analysis Report",
    "",
    "## Key Statistics",
    `- Total jobs analysed: ${statistics.totalJobs}`,
    `- AI-specific roles: ${statistics.aiRoles} (${statistics.aiRolePercentage}%)`,
    `- Remote positions: ${statistics.remotePercentage}%`,
    salaryLine,
    "",
    "### Top Skills",
    formatRanking(statistics.topSkills),
    "",
    "## Executive Summary",
    sections.executiveSummary.trim(),
    "",
    "## Technical Skills Landscape",
    sections.technicalLandscape.trim(),
    "",
    "## Market Dynamics",
    sections.marketDynamics.trim(),
    "",
    "## AI Impact Assessment",
    sections.aiImpactAssessment.trim(),
    "",
    "## Strategic Recommendations",
    sections.recommendations.trim(),
    "",
    `Report generated on: ${generatedAt}`,
    "",
  ].join("\n");
}

export interface WrittenReports {
  reportPath: string | null;
  statePath: string;
}

/** The state file is always written; the markdown report only once the final report exists. */
export async function writeReports(
  state: WorkflowState<JobMarketFields>,
  dirs: { dataDir: string; reportsDir: string },
  generatedAt = new Date().toISOString()
): Promise<WrittenReports> {
  await mkdir(dirs.dataDir, { recursive: true });
  const statePath = join(dirs.dataDir, STATE_FILE);
  await writeFile(statePath, JSON.stringify({ ...state, timestamp: generatedAt }, null, 2), "utf8");

  const finalReport = state.fields.finalReport;
  if (!finalReport) {
    logger.info({ statePath }, "Workflow state written, no final report to render");
    return { reportPath: null, statePath };
  }

  await mkdir(dirs.reportsDir, { recursive: true });
  const reportPath = join(dirs.reportsDir, REPORT_FILE);
  await writeFile(reportPath, renderMarkdownReport(finalReport, generatedAt), "utf8");
  logger.info({ reportPath, statePath }, "Reports written");
  return { reportPath, statePath };
}
