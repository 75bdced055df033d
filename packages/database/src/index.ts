// ──────────────────────────────────────────────
// JobPulse - Database Package
// ──────────────────────────────────────────────

export * from "./schema/index.js";
export { openDatabase, closeConnection } from "./connection.js";
export type { Database, DatabaseConnection } from "./connection.js";
export { PgCheckpointStore, toCheckpointRow } from "./pg-checkpoint-store.js";
export { runMigrations, listMigrations, MIGRATIONS_DIR } from "./migrate.js";
