import test from "node:test";
import assert from "node:assert/strict";
import { parseSalary, percentage, rankCounts, salaryStatistics, sortCounts } from "./salary.js";

test("parseSalary annualises ranges and periods", () => {
  assert.equal(parseSalary("100K–150K a year"), 125000);
  assert.equal(parseSalary("$85,000 a year"), 85000);
  assert.equal(parseSalary("$45–$60 an hour"), 109200);
  assert.equal(parseSalary("5K a month"), 60000);
});

test("parseSalary returns null without an amount", () => {
  assert.equal(parseSalary(null), null);
  assert.equal(parseSalary(""), null);
  assert.equal(parseSalary("Competitive"), null);
  assert.equal(parseSalary("0 a year"), null);
});

test("salaryStatistics reports zeros for an empty sample", () => {
  assert.deepEqual(salaryStatistics([]), { sampleSize: 0, average: 0, median: 0, min: 0, max: 0 });
});

test("salaryStatistics computes average, median and range", () => {
  assert.deepEqual(salaryStatistics([90000, 60000, 120000, 100000]), {
    sampleSize: 4,
    average: 92500,
    median: 95000,
    min: 60000,
    max: 120000,
  });
  assert.equal(salaryStatistics([3, 1, 2]).median, 2);
});

test("rankCounts orders by count then name", () => {
  assert.deepEqual(rankCounts(["Paris", "Berlin", "Paris", "Austin", "Berlin", "Oslo"], 3), [
    { name: "Berlin", count: 2 },
    { name: "Paris", count: 2 },
    { name: "Austin", count: 1 },
  ]);
  assert.deepEqual(sortCounts({ b: 1, a: 1, c: 5 }), [
    { name: "c", count: 5 },
    { name: "a", count: 1 },
    { name: "b", count: 1 },
  ]);
});

test("percentage rounds to one decimal and tolerates zero totals", () => {
  assert.equal(percentage(1, 3), 33.3);
  assert.equal(percentage(2, 3), 66.7);
  assert.equal(percentage(0, 0), 0);
});
