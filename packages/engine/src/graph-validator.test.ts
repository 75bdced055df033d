import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import type { StageDefinition, StateCodec, WorkflowDefinition, WorkflowState } from "@jobpulse/types";
import { END, START } from "@jobpulse/types";
import { GraphValidationError } from "@jobpulse/utils";
import {
  checkTransitions,
  createStageRegistry,
  createWorkflow,
  succeed,
  validateWorkflowGraph,
} from "./index.js";

type Fields = { jobs: string[]; analysis: string; salaries: string; impact: string };

const schema = z
  .object({ jobs: z.array(z.string()), analysis: z.string(), salaries: z.string(), impact: z.string() })
  .partial();
const codec: StateCodec<Fields> = { parse: (raw) => schema.parse(raw) };

function stage(name: string, owns: Array<keyof Fields>, reads: Array<keyof Fields> = []): StageDefinition<Fields> {
  return { name, owns, reads, run: async () => succeed({}) };
}

function definition(overrides: Partial<WorkflowDefinition<Fields>>): WorkflowDefinition<Fields> {
  return {
    name: "graph",
    start: "collect",
    codec,
    stages: [stage("collect", ["jobs"]), stage("analyze", ["analysis"], ["jobs"])],
    edges: [
      { from: "collect", to: "analyze" },
      { from: "analyze", to: END },
    ],
    ...overrides,
  };
}

test("accepts a linear graph without warnings", () => {
  const result = validateWorkflowGraph(definition({}));
  assert.deepEqual(result, { valid: true, errors: [], warnings: [] });
});

test("unknown stage names are rejected when the workflow is built", () => {
  assert.throws(
    () =>
      createWorkflow(
        definition({
          edges: [
            { from: "collect", to: "analyse" },
            { from: "analyze", to: END },
          ],
        })
      ),
    (err: unknown) =>
      err instanceof GraphValidationError &&
      err.errors.includes('Edge "collect -> analyse" targets unknown stage "analyse"')
  );
});

test("stage names the engine reserves are rejected when the workflow is built", () => {
  assert.throws(
    () =>
      createWorkflow(
        definition({
          stages: [stage("collect", ["jobs"]), stage("ERROR", ["analysis"], ["jobs"])],
          edges: [
            { from: "collect", to: "ERROR" },
            { from: "ERROR", to: END },
          ],
        })
      ),
    (err: unknown) => err instanceof GraphValidationError && err.errors.join("|") === 'Stage name "ERROR" is reserved'
  );

  const result = validateWorkflowGraph(
    definition({
      stages: [stage("collect", ["jobs"]), stage(START, ["analysis"], ["jobs"])],
      edges: [
        { from: "collect", to: START },
        { from: START, to: END },
      ],
    })
  );
  assert.deepEqual(result.errors, ['Stage name "__start__" is reserved']);
});

test("reports stages without outgoing edges and an unreachable END", () => {
  const result = validateWorkflowGraph(
    definition({
      edges: [
        { from: "collect", to: "analyze" },
        { from: "analyze", to: "collect" },
      ],
    })
  );
  assert.equal(result.valid, false);
  assert.deepEqual(result.errors, ['END is not reachable from start node "collect"']);

  const dangling = validateWorkflowGraph(definition({ edges: [{ from: "collect", to: "analyze" }] }));
  assert.ok(dangling.errors.includes('Stage "analyze" has no outgoing edge'));
});

test("a field may only be owned by one stage", () => {
  const result = validateWorkflowGraph(
    definition({ stages: [stage("collect", ["jobs"]), stage("analyze", ["analysis", "jobs"])] })
  );
  assert.deepEqual(result.errors, ['Field "jobs" is owned by both "collect" and "analyze"']);
});

test("fan-out branches must be independent and at least two", () => {
  const result = validateWorkflowGraph(
    definition({
      stages: [
        stage("collect", ["jobs"]),
        stage("salaries", ["salaries"], ["jobs"]),
        stage("impact", ["impact"], ["salaries"]),
        stage("analyze", ["analysis"]),
      ],
      edges: [
        { from: "collect", fanOut: ["salaries", "impact"], join: "analyze" },
        { from: "analyze", to: END },
      ],
    })
  );
  assert.deepEqual(result.errors, ['Fan-out branch "impact" reads "salaries" owned by sibling "salaries"']);

  const single = validateWorkflowGraph(
    definition({
      stages: [stage("collect", ["jobs"]), stage("salaries", ["salaries"]), stage("analyze", ["analysis"])],
      edges: [
        { from: "collect", fanOut: ["salaries"], join: "analyze" },
        { from: "analyze", to: END },
      ],
    })
  );
  assert.deepEqual(single.errors, ['Fan-out "collect -> [salaries] -> analyze" needs at least two branches']);
});

test("warns about unreachable stages and all-conditional nodes", () => {
  const result = validateWorkflowGraph(
    definition({
      stages: [stage("collect", ["jobs"]), stage("analyze", ["analysis"]), stage("orphan", ["impact"])],
      edges: [
        { from: "collect", to: "analyze", when: (state) => (state.fields.jobs?.length ?? 0) > 0 },
        { from: "collect", to: END, when: (state) => (state.fields.jobs?.length ?? 0) === 0 },
        { from: "analyze", to: END },
        { from: "orphan", to: END },
      ],
    })
  );
  assert.equal(result.valid, true);
  assert.deepEqual(result.warnings, [
    'All edges leaving "collect" are conditional; exhaustiveness can only be checked against sample states',
    'Stage "orphan" is unreachable from the start node',
  ]);
});

function sampleStates(): WorkflowState<Fields>[] {
  const jobSets: Array<string[] | undefined> = [undefined, [], ["Data analyst"], ["Data analyst", "AI engineer"]];
  const analyses: Array<string | undefined> = [undefined, "done"];
  const states: WorkflowState<Fields>[] = [];
  for (const jobs of jobSets) {
    for (const analysis of analyses) {
      for (const forceRestart of [false, true]) {
        states.push({ fields: { jobs, analysis }, error: null, control: { forceRestart } });
      }
    }
  }
  return states;
}

test("mutually exclusive edge conditions are exhaustive over enumerated states", () => {
  const hasJobs = (state: Readonly<WorkflowState<Fields>>): boolean => (state.fields.jobs?.length ?? 0) > 0;
  const result = checkTransitions<Fields>(
    {
      edges: [
        { from: "collect", to: "analyze", when: hasJobs },
        { from: "collect", to: END, when: (state) => !hasJobs(state) },
        { from: "analyze", to: END },
      ],
    },
    sampleStates()
  );

  assert.equal(result.exhaustive, true);
  assert.equal(result.checkedPairs, 32);
  assert.deepEqual(result.violations, []);
});

test("overlapping or missing conditions are reported per state", () => {
  const result = checkTransitions<Fields>(
    {
      edges: [
        { from: "collect", to: "analyze", when: (state) => (state.fields.jobs?.length ?? 0) > 1 },
        { from: "collect", to: END, label: "fallback" },
        { from: "analyze", to: END, when: (state) => state.fields.analysis !== undefined },
      ],
    },
    sampleStates()
  );

  assert.equal(result.exhaustive, false);
  const ambiguous = result.violations.filter((violation) => violation.kind === "ambiguous-transition");
  const missing = result.violations.filter((violation) => violation.kind === "no-viable-transition");
  assert.equal(ambiguous.length, 4);
  assert.deepEqual(ambiguous[0]?.matchedEdges, ["collect -> analyze", "fallback"]);
  assert.equal(missing.length, 8);
  assert.ok(missing.every((violation) => violation.stage === "analyze"));
});

test("the stage registry is closed over unique, non-reserved names", () => {
  const registry = createStageRegistry([stage("collect", ["jobs"]), stage("analyze", ["analysis"])]);
  assert.deepEqual(registry.names(), ["collect", "analyze"]);
  assert.throws(() => registry.resolve("report"), /Unknown stage "report"/);
  assert.throws(() => createStageRegistry([stage("collect", ["jobs"]), stage("collect", ["analysis"])]), /already registered/);
  assert.throws(() => createStageRegistry([stage(END, ["jobs"])]), /reserved/);
});
