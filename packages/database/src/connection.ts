// ──────────────────────────────────────────────
// JobPulse - Database Connection
// One pool per process, shared by checkpoints and migrations
// ──────────────────────────────────────────────

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres, { type Sql } from "postgres";
import * as schema from "./schema/index.js";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  url: string;
  sql: Sql;
  db: Database;
}

let active: DatabaseConnection | null = null;

export function openDatabase(databaseUrl: string): DatabaseConnection {
  if (active) {
    if (active.url !== databaseUrl) {
      throw new Error("A database connection to another URL is already open");
    }
    return active;
  }
  const sql = postgres(databaseUrl, { max: 5, idle_timeout: 20, connect_timeout: 10 });
  active = { url: databaseUrl, sql, db: drizzle(sql, { schema }) };
  return active;
}

export async function closeConnection(): Promise<void> {
  if (!active) return;
  const { sql } = active;
  active = null;
  await sql.end();
}
