// ──────────────────────────────────────────────
// JobPulse - Postgres Checkpoint Store
// ──────────────────────────────────────────────

import { eq } from "drizzle-orm";
import type { CheckpointRecord, CheckpointStore } from "@jobpulse/types";
import { decodeCheckpoint } from "@jobpulse/engine";
import { CheckpointError, sanitizeErrorMessage } from "@jobpulse/utils";
import type { Database } from "./connection.js";
import { workflowCheckpoints, type NewWorkflowCheckpointRow } from "./schema/index.js";

export function toCheckpointRow(key: string, record: CheckpointRecord): NewWorkflowCheckpointRow {
  return {
    key,
    workflow: record.workflow,
    lastCompletedStage: record.lastCompletedStage,
    status: record.state.error === null ? "ok" : "error",
    record,
    savedAt: new Date(record.savedAt),
  };
}

export class PgCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Database) {}

  async load(key: string): Promise<CheckpointRecord | null> {
    const rows = await this.db
      .select({ record: workflowCheckpoints.record })
      .from(workflowCheckpoints)
      .where(eq(workflowCheckpoints.key, key))
      .limit(1);

    const row = rows[0];
    return row ? decodeCheckpoint(row.record) : null;
  }

  async save(key: string, record: CheckpointRecord): Promise<void> {
    const row = toCheckpointRow(key, record);
    try {
      await this.db
        .insert(workflowCheckpoints)
        .values(row)
        .onConflictDoUpdate({
          target: workflowCheckpoints.key,
          set: {
            workflow: row.workflow,
            lastCompletedStage: row.lastCompletedStage,
            status: row.status,
            record: row.record,
            savedAt: row.savedAt,
            updatedAt: new Date(),
          },
        });
    } catch (err) {
      throw new CheckpointError(`Failed to write checkpoint "${key}": ${sanitizeErrorMessage(err)}`, err);
    }
  }

  async clear(key: string): Promise<void> {
    await this.db.delete(workflowCheckpoints).where(eq(workflowCheckpoints.key, key));
  }
}
