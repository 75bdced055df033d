// ──────────────────────────────────────────────
// JobPulse - Salary Parsing & Statistics
// ──────────────────────────────────────────────

import type { RankedCount, SalaryStatistics } from "./state.js";

const HOURS_PER_YEAR = 2080;

const PERIOD_MULTIPLIERS: Array<[RegExp, number]> = [
  [/\b(hour|hourly|hr)\b/i, HOURS_PER_YEAR],
  [/\b(day|daily)\b/i, 260],
  [/\b(week|weekly|wk)\b/i, 52],
  [/\b(month|monthly|mo)\b/i, 12],
];

/**
 * Annualised salary from a posting's free-text salary ("100K–150K a year",
 * "$45–$60 an hour"). Ranges yield their midpoint.
 */
export function parseSalary(text: string | null | undefined): number | null {
  if (!text) return null;

  const amounts: number[] = [];
  for (const match of text.matchAll(/(\d+(?:[.,]\d+)*)\s*([kK])?/g)) {
    const digits = match[1];
    if (digits === undefined) continue;
    const value = Number.parseFloat(digits.replace(/,/g, ""));
    if (!Number.isFinite(value)) continue;
    amounts.push(match[2] ? value * 1000 : value);
    if (amounts.length === 2) break;
  }

  const [low, high] = amounts;
  if (low === undefined) return null;
  const base = high === undefined ? low : (low + high) / 2;
  if (base <= 0) return null;

  const multiplier = PERIOD_MULTIPLIERS.find(([pattern]) => pattern.test(text))?.[1] ?? 1;
  return Math.round(base * multiplier);
}

export function salaryStatistics(values: readonly number[]): SalaryStatistics {
  if (values.length === 0) {
    return { sampleSize: 0, average: 0, median: 0, min: 0, max: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  const middle = Math.floor(sorted.length / 2);
  const median =
    sorted.length % 2 === 0 ? ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2 : (sorted[middle] ?? 0);

  return {
    sampleSize: sorted.length,
    average: Math.round(total / sorted.length),
    median: Math.round(median),
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
  };
}

/** Counts by key, highest first, ties alphabetical. */
export function rankCounts(keys: Iterable<string>, limit: number): RankedCount[] {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return sortCounts(Object.fromEntries(counts)).slice(0, limit);
}

export function sortCounts(counts: Readonly<Record<string, number>>): RankedCount[] {
  return Object.entries(counts)
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || compareNames(a.name, b.name));
}

function compareNames(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}
