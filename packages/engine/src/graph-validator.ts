// ──────────────────────────────────────────────
// JobPulse - Workflow Graph Validator
// Structural checks at build time, transition
// exhaustiveness checks over sample states
// ──────────────────────────────────────────────

import type {
  EdgeDefinition,
  FanOutEdge,
  StateFields,
  WorkflowDefinition,
  WorkflowState,
} from "@jobpulse/types";
import { END, START } from "@jobpulse/types";

/** Names the engine uses for its own nodes and terminal states. */
export const RESERVED_STAGE_NAMES: ReadonlySet<string> = new Set([START, END, "ERROR"]);

export interface GraphValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function isFanOutEdge<F extends StateFields>(edge: EdgeDefinition<F>): edge is FanOutEdge<F> {
  return "fanOut" in edge;
}

export function describeEdge<F extends StateFields>(edge: EdgeDefinition<F>): string {
  if (edge.label) return edge.label;
  return isFanOutEdge(edge)
    ? `${edge.from} -> [${edge.fanOut.join(", ")}] -> ${edge.join}`
    : `${edge.from} -> ${edge.to}`;
}

export function validateWorkflowGraph<F extends StateFields>(
  definition: WorkflowDefinition<F>
): GraphValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const stageNames = new Set<string>();
  for (const stage of definition.stages) {
    if (RESERVED_STAGE_NAMES.has(stage.name)) {
      errors.push(`Stage name "${stage.name}" is reserved`);
    }
    if (stageNames.has(stage.name)) {
      errors.push(`Stage "${stage.name}" is defined more than once`);
    }
    stageNames.add(stage.name);
  }

  // Field ownership
  const owners = new Map<string, string>();
  for (const stage of definition.stages) {
    if (stage.owns.length === 0) {
      errors.push(`Stage "${stage.name}" must own at least one state field`);
    }
    for (const field of stage.owns) {
      if (field === "error" || field === "control") {
        errors.push(`Stage "${stage.name}" cannot own reserved field "${field}"`);
        continue;
      }
      const owner = owners.get(field);
      if (owner && owner !== stage.name) {
        errors.push(`Field "${field}" is owned by both "${owner}" and "${stage.name}"`);
      } else {
        owners.set(field, stage.name);
      }
    }
  }
  for (const stage of definition.stages) {
    for (const field of stage.reads ?? []) {
      if (!owners.has(field)) {
        errors.push(`Stage "${stage.name}" reads field "${field}" that no stage owns`);
      }
    }
  }

  if (!stageNames.has(definition.start)) {
    errors.push(`Start node "${definition.start}" is not a defined stage`);
  }

  const isTarget = (name: string): boolean => name === END || stageNames.has(name);
  const outgoing = new Map<string, EdgeDefinition<F>[]>();
  const branchStages = new Set<string>();
  const transitionTargets = new Set<string>([definition.start]);

  for (const edge of definition.edges) {
    const label = describeEdge(edge);
    if (!stageNames.has(edge.from)) {
      errors.push(`Edge "${label}" starts at unknown stage "${edge.from}"`);
      continue;
    }
    outgoing.set(edge.from, [...(outgoing.get(edge.from) ?? []), edge]);

    if (!isFanOutEdge(edge)) {
      if (!isTarget(edge.to)) {
        errors.push(`Edge "${label}" targets unknown stage "${edge.to}"`);
      }
      transitionTargets.add(edge.to);
      continue;
    }

    if (!isTarget(edge.join)) {
      errors.push(`Fan-out "${label}" joins at unknown stage "${edge.join}"`);
    }
    transitionTargets.add(edge.join);
    if (edge.fanOut.length < 2) {
      errors.push(`Fan-out "${label}" needs at least two branches`);
    }
    if (new Set(edge.fanOut).size !== edge.fanOut.length) {
      errors.push(`Fan-out "${label}" lists a branch more than once`);
    }
    for (const branch of edge.fanOut) {
      if (!stageNames.has(branch)) {
        errors.push(`Fan-out "${label}" has unknown branch stage "${branch}"`);
      }
      branchStages.add(branch);
    }
    errors.push(...checkBranchIndependence(definition, edge));
  }

  for (const name of stageNames) {
    const edges = outgoing.get(name) ?? [];
    if (branchStages.has(name)) {
      if (edges.length > 0) {
        errors.push(`Fan-out branch "${name}" cannot have outgoing edges; it continues at the join`);
      }
      if (transitionTargets.has(name)) {
        errors.push(`Fan-out branch "${name}" cannot also be the start or a transition target`);
      }
      continue;
    }
    if (edges.length === 0) {
      errors.push(`Stage "${name}" has no outgoing edge`);
    } else if (edges.every((edge) => edge.when !== undefined)) {
      warnings.push(
        `All edges leaving "${name}" are conditional; exhaustiveness can only be checked against sample states`
      );
    }
  }

  // Reachability from the start node
  const reachable = new Set<string>();
  const queue: string[] = stageNames.has(definition.start) ? [definition.start] : [];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || reachable.has(current)) continue;
    reachable.add(current);
    if (current === END) continue;
    for (const edge of outgoing.get(current) ?? []) {
      if (isFanOutEdge(edge)) {
        queue.push(...edge.fanOut, edge.join);
      } else {
        queue.push(edge.to);
      }
    }
  }

  if (stageNames.has(definition.start) && !reachable.has(END)) {
    errors.push(`END is not reachable from start node "${definition.start}"`);
  }
  for (const name of stageNames) {
    if (!reachable.has(name)) {
      warnings.push(`Stage "${name}" is unreachable from the start node`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

function checkBranchIndependence<F extends StateFields>(
  definition: WorkflowDefinition<F>,
  edge: FanOutEdge<F>
): string[] {
  const errors: string[] = [];
  const branches = definition.stages.filter((stage) => edge.fanOut.includes(stage.name));

  for (const branch of branches) {
    for (const sibling of branches) {
      if (sibling.name === branch.name) continue;
      const siblingOwns = new Set<string>(sibling.owns);
      const reads = (branch.reads ?? []).filter((field) => siblingOwns.has(field));
      if (reads.length > 0) {
        errors.push(
          `Fan-out branch "${branch.name}" reads ${reads.map((field) => `"${field}"`).join(", ")} owned by sibling "${sibling.name}"`
        );
      }
    }
  }
  return errors;
}

export type TransitionViolationKind = "no-viable-transition" | "ambiguous-transition";

export interface TransitionViolation {
  stage: string;
  stateIndex: number;
  kind: TransitionViolationKind;
  matchedEdges: string[];
}

export interface TransitionCheckResult {
  exhaustive: boolean;
  checkedPairs: number;
  violations: TransitionViolation[];
}

/**
 * For every stage with outgoing edges and every sample state, exactly one
 * edge condition must hold.
 */
export function checkTransitions<F extends StateFields>(
  definition: Pick<WorkflowDefinition<F>, "edges">,
  states: readonly WorkflowState<F>[]
): TransitionCheckResult {
  const bySource = new Map<string, EdgeDefinition<F>[]>();
  for (const edge of definition.edges) {
    bySource.set(edge.from, [...(bySource.get(edge.from) ?? []), edge]);
  }

  const violations: TransitionViolation[] = [];
  let checkedPairs = 0;

  for (const [stage, edges] of bySource) {
    states.forEach((state, stateIndex) => {
      checkedPairs += 1;
      const matchedEdges = edges.filter((edge) => edge.when?.(state) ?? true).map(describeEdge);
      if (matchedEdges.length === 0) {
        violations.push({ stage, stateIndex, kind: "no-viable-transition", matchedEdges });
      } else if (matchedEdges.length > 1) {
        violations.push({ stage, stateIndex, kind: "ambiguous-transition", matchedEdges });
      }
    });
  }

  return { exhaustive: violations.length === 0, checkedPairs, violations };
}
