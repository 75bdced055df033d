import test from "node:test";
import assert from "node:assert/strict";
import {
  backoffDelay,
  contentId,
  readPathValue,
  redactSecrets,
  safeJsonParse,
  sanitizeErrorMessage,
  stripCodeFences,
  truncateString,
} from "./helpers.js";

test("backoffDelay doubles per attempt up to the cap", () => {
  assert.deepEqual(
    [1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 1000, 10000)),
    [1000, 2000, 4000, 8000, 10000]
  );
  assert.equal(backoffDelay(3, 0, 10000), 0);
});

test("contentId is stable and prefixed", () => {
  const id = contentId("job", "Data engineer at Contoso");
  assert.equal(id, contentId("job", "Data engineer at Contoso"));
  assert.match(id, /^job:[0-9a-f]{16}$/);
  assert.notEqual(id, contentId("job", "Data engineer at Fabrikam"));
});

test("stripCodeFences unwraps fenced answers only", () => {
  assert.equal(stripCodeFences('```json\n{"a":1}\n```'), '{"a":1}');
  assert.equal(stripCodeFences("```\n[1, 2]\n```"), "[1, 2]");
  assert.equal(stripCodeFences('  {"a":1}  '), '{"a":1}');
});

test("safeJsonParse reports failures instead of throwing", () => {
  assert.deepEqual(safeJsonParse('{"ok":true}'), { success: true, data: { ok: true } });
  assert.equal(safeJsonParse("{").success, false);
});

test("truncateString keeps the limit including the ellipsis", () => {
  assert.equal(truncateString("abcdef", 6), "abcdef");
  assert.equal(truncateString("abcdefgh", 6), "abc...");
});

test("redactSecrets hides keys and bearer tokens", () => {
  assert.equal(
    redactSecrets("GET /search.json?q=x&api_key=test-secret&hl=en"),
    "GET /search.json?q=x&api_key=[REDACTED]&hl=en"
  );
  assert.equal(redactSecrets("Authorization: Bearer test.token-value"), "Authorization: Bearer [REDACTED]");
  assert.equal(sanitizeErrorMessage(new Error("Bearer abc")), "Bearer [REDACTED]");
  assert.equal(sanitizeErrorMessage(42), "An unexpected error occurred");
});

test("readPathValue walks nested records", () => {
  const source = { techAnalysis: { emergingTrends: ["agents"], batches: { skipped: 0 } } };
  assert.deepEqual(readPathValue(source, "techAnalysis.emergingTrends"), ["agents"]);
  assert.equal(readPathValue(source, "techAnalysis.batches.skipped"), 0);
  assert.equal(readPathValue(source, "techAnalysis.emergingTrends.length"), undefined);
  assert.equal(readPathValue(source, "missing.path"), undefined);
});
