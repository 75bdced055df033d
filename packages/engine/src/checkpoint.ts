// ──────────────────────────────────────────────
// JobPulse - Checkpoints
// Serialized WorkflowState records and the in-process
// and file-backed stores
// ──────────────────────────────────────────────

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type {
  CheckpointRecord,
  CheckpointStore,
  StateCodec,
  StateFields,
  WorkflowState,
} from "@jobpulse/types";
import { CheckpointError, safeJsonParse, sanitizeErrorMessage } from "@jobpulse/utils";

const checkpointSchema = z.object({
  version: z.literal(1),
  workflow: z.string().min(1),
  savedAt: z.string(),
  lastCompletedStage: z.string().nullable(),
  state: z.object({
    fields: z.record(z.unknown()),
    error: z.string().nullable(),
    control: z.object({ forceRestart: z.boolean() }),
  }),
});

export function encodeCheckpoint<F extends StateFields>(
  workflow: string,
  state: WorkflowState<F>,
  lastCompletedStage: string | null,
  savedAt: Date = new Date()
): CheckpointRecord {
  const fields: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(state.fields)) {
    if (value !== undefined) {
      fields[name] = structuredClone(value);
    }
  }

  return {
    version: 1,
    workflow,
    savedAt: savedAt.toISOString(),
    lastCompletedStage,
    state: {
      fields,
      error: state.error,
      control: { forceRestart: state.control.forceRestart },
    },
  };
}

export function decodeCheckpoint(raw: unknown): CheckpointRecord {
  const parsed = checkpointSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CheckpointError(
      `Invalid checkpoint record: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`
    );
  }
  return parsed.data;
}

export function serializeCheckpoint(record: CheckpointRecord): string {
  return JSON.stringify(record, null, 2);
}

export function parseCheckpoint(text: string): CheckpointRecord {
  const json = safeJsonParse(text);
  if (!json.success) {
    throw new CheckpointError(`Checkpoint is not valid JSON: ${json.error}`);
  }
  return decodeCheckpoint(json.data);
}

export function restoreState<F extends StateFields>(
  record: CheckpointRecord,
  codec: StateCodec<F>
): WorkflowState<F> {
  let fields: Partial<F>;
  try {
    fields = codec.parse(record.state.fields);
  } catch (err) {
    throw new CheckpointError(`Checkpoint fields failed validation: ${sanitizeErrorMessage(err)}`, err);
  }
  return {
    fields,
    error: record.state.error,
    control: { forceRestart: record.state.control.forceRestart },
  };
}

/** Keeps records serialized so a load never aliases engine state. */
export class MemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, string>();
  saves = 0;

  async load(key: string): Promise<CheckpointRecord | null> {
    const text = this.records.get(key);
    return text === undefined ? null : parseCheckpoint(text);
  }

  async save(key: string, record: CheckpointRecord): Promise<void> {
    this.records.set(key, serializeCheckpoint(record));
    this.saves += 1;
  }

  async clear(key: string): Promise<void> {
    this.records.delete(key);
  }
}

export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly directory: string) {}

  pathFor(key: string): string {
    return join(this.directory, `${key.replace(/[^\w.-]+/g, "_")}.checkpoint.json`);
  }

  async load(key: string): Promise<CheckpointRecord | null> {
    let text: string;
    try {
      text = await readFile(this.pathFor(key), "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw new CheckpointError(`Failed to read checkpoint "${key}": ${sanitizeErrorMessage(err)}`, err);
    }
    return parseCheckpoint(text);
  }

  async save(key: string, record: CheckpointRecord): Promise<void> {
    const path = this.pathFor(key);
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, serializeCheckpoint(record), "utf8");
      await rename(tempPath, path);
    } catch (err) {
      throw new CheckpointError(`Failed to write checkpoint "${key}": ${sanitizeErrorMessage(err)}`, err);
    }
  }

  async clear(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
