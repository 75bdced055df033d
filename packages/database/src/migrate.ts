// ──────────────────────────────────────────────
// JobPulse - Database Migration Runner
// Applies sql/*.sql in name order, once each
// ──────────────────────────────────────────────

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "@jobpulse/utils";
import { openDatabase } from "./connection.js";

const logger = createLogger("migrations");

export const MIGRATIONS_DIR = fileURLToPath(new URL("../sql/", import.meta.url));

export async function listMigrations(directory: string = MIGRATIONS_DIR): Promise<string[]> {
  const entries = await readdir(directory);
  return entries.filter((entry) => entry.endsWith(".sql")).sort();
}

export async function runMigrations(databaseUrl: string, directory: string = MIGRATIONS_DIR): Promise<string[]> {
  const { sql } = openDatabase(databaseUrl);

  await sql.unsafe(
    `CREATE TABLE IF NOT EXISTS "schema_migrations" (
      "name" varchar(255) PRIMARY KEY NOT NULL,
      "applied_at" timestamp with time zone DEFAULT now() NOT NULL
    )`
  );
  const appliedRows = await sql.unsafe(`SELECT "name" FROM "schema_migrations"`);
  const applied = new Set(appliedRows.map((row) => String(row["name"])));

  const pending = (await listMigrations(directory)).filter((name) => !applied.has(name));
  logger.info({ pending: pending.length, applied: applied.size }, "Running migrations");

  for (const name of pending) {
    await sql.begin(async (tx) => {
      await tx.file(join(directory, name));
      await tx.unsafe(`INSERT INTO "schema_migrations" ("name") VALUES ($1)`, [name]);
    });
    logger.info({ migration: name }, "Migration applied");
  }

  return pending;
}
