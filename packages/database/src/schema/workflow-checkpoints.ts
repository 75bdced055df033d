// ──────────────────────────────────────────────
// JobPulse - Workflow Checkpoints Table Schema
// One row per checkpoint key, overwritten on every commit
// ──────────────────────────────────────────────

import { pgTable, varchar, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type { CheckpointRecord } from "@jobpulse/types";

export const workflowCheckpoints = pgTable(
  "workflow_checkpoints",
  {
    key: varchar("key", { length: 255 }).primaryKey(),
    workflow: varchar("workflow", { length: 255 }).notNull(),
    lastCompletedStage: varchar("last_completed_stage", { length: 255 }),
    status: varchar("status", { length: 20 }).notNull(), // ok | error
    record: jsonb("record").$type<CheckpointRecord>().notNull(),
    savedAt: timestamp("saved_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    workflowIdx: index("workflow_checkpoints_workflow_idx").on(table.workflow),
  })
);

export type WorkflowCheckpointRow = typeof workflowCheckpoints.$inferSelect;
export type NewWorkflowCheckpointRow = typeof workflowCheckpoints.$inferInsert;
