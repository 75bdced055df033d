import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { StageFailure } from "@jobpulse/utils";
import { generateStructured, parseStructuredAnswer, renderDocumentContext } from "./llm-json.js";
import { FakeLLM } from "./testing/fakes.js";

const schema = z.object({ summary: z.string() });

test("parseStructuredAnswer accepts fenced JSON", () => {
  const answer = parseStructuredAnswer('```json\n{"summary":"ok"}\n```', schema);
  assert.deepEqual(answer, { success: true, data: { summary: "ok" } });
});

test("parseStructuredAnswer reports invalid JSON", () => {
  const answer = parseStructuredAnswer("not json", schema);
  assert.equal(answer.success, false);
  if (!answer.success) {
    assert.match(answer.error, /^Model answer is not valid JSON: /);
    assert.equal(answer.raw, "not json");
  }
});

test("parseStructuredAnswer reports schema violations by path", () => {
  const answer = parseStructuredAnswer('{"summary":42}', schema);
  assert.equal(answer.success, false);
  if (!answer.success) {
    assert.equal(answer.error, "Model answer failed validation: summary: Expected string, received number");
  }
});

test("generateStructured turns transport errors into retryable stage failures", async () => {
  const llm = new FakeLLM(() => {
    throw new Error("socket hang up");
  });

  await assert.rejects(generateStructured(llm, "prompt", schema), (err: unknown) => {
    assert.ok(err instanceof StageFailure);
    assert.equal(err.retryable, true);
    assert.equal(err.message, "LLM request failed: socket hang up");
    return true;
  });
});

test("renderDocumentContext numbers and clips documents", () => {
  assert.equal(renderDocumentContext([]), "(no supporting documents)");
  assert.equal(
    renderDocumentContext(
      [
        { id: "a", text: "short" },
        { id: "b", text: "abcdefghij" },
      ],
      5
    ),
    "[1] short\n\n[2] abcde..."
  );
});
