// ──────────────────────────────────────────────
// JobPulse - Store Snapshot Persistence
// ──────────────────────────────────────────────

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { DocumentStoreSnapshot } from "@jobpulse/types";
import { createLogger, safeJsonParse } from "@jobpulse/utils";
import { DocumentStore, type RestoredStore } from "./document-store.js";
import type { EmbeddingIndexer } from "./embedding-indexer.js";

const logger = createLogger("store-snapshot");

const snapshotSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string().min(1),
  dimensions: z.number().int().positive(),
  documents: z.array(
    z.object({
      id: z.string().min(1),
      text: z.string(),
      metadata: z.record(z.string()),
      vector: z.array(z.number()),
    })
  ),
});

export function parseStoreSnapshot(raw: unknown): DocumentStoreSnapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid document store snapshot: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}

export async function saveStoreSnapshot(store: DocumentStore, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, JSON.stringify(store.snapshot()), "utf8");
  await rename(tempPath, path);
  logger.debug({ path, documents: store.size }, "Document store snapshot saved");
}

/** Returns null when no snapshot has been written yet. */
export async function loadStoreSnapshot(path: string, indexer: EmbeddingIndexer): Promise<RestoredStore | null> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  const json = safeJsonParse(contents);
  if (!json.success) {
    throw new Error(`Document store snapshot at ${path} is not valid JSON: ${json.error}`);
  }

  const restored = await DocumentStore.restore(parseStoreSnapshot(json.data), indexer);
  logger.info({ path, documents: restored.store.size, rebuilt: restored.rebuilt }, "Document store restored");
  return restored;
}

export async function removeStoreSnapshot(path: string): Promise<void> {
  await rm(path, { force: true });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
