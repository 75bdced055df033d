// ──────────────────────────────────────────────
// JobPulse - Workflow Builder
// ──────────────────────────────────────────────

import type {
  EdgeDefinition,
  StageDefinition,
  StateCodec,
  StateFields,
  WorkflowDefinition,
} from "@jobpulse/types";
import { GraphValidationError, createLogger } from "@jobpulse/utils";
import { validateWorkflowGraph } from "./graph-validator.js";
import { createStageRegistry, type StageRegistry } from "./registry.js";

const logger = createLogger("workflow-graph");

export interface CompiledWorkflow<F extends StateFields> {
  readonly name: string;
  readonly start: string;
  readonly registry: StageRegistry<F>;
  readonly codec: StateCodec<F>;
  readonly edges: readonly EdgeDefinition<F>[];
  readonly warnings: readonly string[];
  outgoing(stage: string): readonly EdgeDefinition<F>[];
  stage(name: string): StageDefinition<F>;
}

export function createWorkflow<F extends StateFields>(
  definition: WorkflowDefinition<F>
): CompiledWorkflow<F> {
  const validation = validateWorkflowGraph(definition);
  if (!validation.valid) {
    throw new GraphValidationError(validation.errors);
  }
  for (const warning of validation.warnings) {
    logger.warn({ workflow: definition.name }, warning);
  }

  const registry = createStageRegistry(definition.stages);
  const outgoing = new Map<string, EdgeDefinition<F>[]>();
  for (const edge of definition.edges) {
    outgoing.set(edge.from, [...(outgoing.get(edge.from) ?? []), edge]);
  }

  return {
    name: definition.name,
    start: definition.start,
    registry,
    codec: definition.codec,
    edges: [...definition.edges],
    warnings: validation.warnings,
    outgoing: (stage) => outgoing.get(stage) ?? [],
    stage: (name) => registry.resolve(name),
  };
}
