// ──────────────────────────────────────────────
// JobPulse - Stage Registry
// Closed name → stage mapping, fixed when a workflow is built
// ──────────────────────────────────────────────

import type { StageDefinition, StateFields } from "@jobpulse/types";
import { RESERVED_STAGE_NAMES } from "./graph-validator.js";

export class StageRegistry<F extends StateFields> {
  private readonly stages = new Map<string, StageDefinition<F>>();

  register(stage: StageDefinition<F>): void {
    if (RESERVED_STAGE_NAMES.has(stage.name)) {
      throw new Error(`Stage name "${stage.name}" is reserved`);
    }
    if (this.stages.has(stage.name)) {
      throw new Error(`Stage "${stage.name}" is already registered`);
    }
    this.stages.set(stage.name, stage);
  }

  resolve(name: string): StageDefinition<F> {
    const stage = this.stages.get(name);
    if (!stage) {
      throw new Error(
        `Unknown stage "${name}". Available stages: ${Array.from(this.stages.keys()).join(", ")}`
      );
    }
    return stage;
  }

  has(name: string): boolean {
    return this.stages.has(name);
  }

  names(): string[] {
    return Array.from(this.stages.keys());
  }
}

export function createStageRegistry<F extends StateFields>(
  stages: readonly StageDefinition<F>[]
): StageRegistry<F> {
  const registry = new StageRegistry<F>();
  for (const stage of stages) {
    registry.register(stage);
  }
  return registry;
}
