// ──────────────────────────────────────────────
// JobPulse - Document Store
// Append-only; a document is visible only once indexed
// ──────────────────────────────────────────────

import type {
  Document,
  DocumentStoreSnapshot,
  MetadataFilter,
  NewDocument,
  VectorSearchHit,
} from "@jobpulse/types";
import {
  DimensionMismatchError,
  DocumentNotFoundError,
  DuplicateIdError,
  createLogger,
  generateId,
} from "@jobpulse/utils";
import type { EmbeddingIndexer } from "./embedding-indexer.js";
import { LexicalIndex } from "./lexical-index.js";

const logger = createLogger("document-store");

export interface RestoredStore {
  store: DocumentStore;
  rebuilt: boolean;
}

export class DocumentStore {
  private readonly documents = new Map<string, Document>();
  private readonly positions = new Map<string, number>();
  private readonly reserved = new Set<string>();
  private readonly lexical = new LexicalIndex();
  private nextPosition = 0;

  constructor(readonly indexer: EmbeddingIndexer) {}

  get size(): number {
    return this.documents.size;
  }

  async put(doc: NewDocument): Promise<string> {
    const id = doc.id ?? generateId();
    if (this.documents.has(id) || this.reserved.has(id)) {
      throw new DuplicateIdError(id);
    }

    this.reserved.add(id);
    try {
      const vector = await this.indexer.embed(doc.text);
      this.insert(id, doc.text, { ...(doc.metadata ?? {}) }, vector);
    } finally {
      this.reserved.delete(id);
    }
    return id;
  }

  async putMany(docs: readonly NewDocument[]): Promise<string[]> {
    const ids: string[] = [];
    for (const doc of docs) {
      ids.push(await this.put(doc));
    }
    return ids;
  }

  get(id: string): Document {
    const doc = this.documents.get(id);
    if (!doc) {
      throw new DocumentNotFoundError(id);
    }
    return doc;
  }

  find(id: string): Document | undefined {
    return this.documents.get(id);
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  /** Insertion position, used as the final tie-break in ranked results. */
  positionOf(id: string): number {
    return this.positions.get(id) ?? Number.MAX_SAFE_INTEGER;
  }

  /**
   * Lazy and restartable: every iteration walks the documents present when
   * that iteration starts.
   */
  list(filter?: MetadataFilter): Iterable<Document> {
    const documents = this.documents;
    const matches = toPredicate(filter);
    return {
      *[Symbol.iterator]() {
        for (const doc of [...documents.values()]) {
          if (matches(doc.metadata)) {
            yield doc;
          }
        }
      },
    };
  }

  lexicalSearch(text: string, topK: number): VectorSearchHit[] {
    return this.lexical.search(text, topK);
  }

  snapshot(): DocumentStoreSnapshot {
    return {
      version: 1,
      embeddingModel: this.indexer.model,
      dimensions: this.indexer.dimensions,
      documents: [...this.documents.values()].map((doc) => ({
        id: doc.id,
        text: doc.text,
        metadata: { ...doc.metadata },
        vector: [...(this.indexer.vectorOf(doc.id) ?? [])],
      })),
    };
  }

  /**
   * Vectors are reused when the snapshot was built by the indexer's model at
   * the same dimensionality; otherwise every document is re-embedded.
   */
  static async restore(snapshot: DocumentStoreSnapshot, indexer: EmbeddingIndexer): Promise<RestoredStore> {
    const store = new DocumentStore(indexer);
    const rebuilt =
      snapshot.embeddingModel !== indexer.model || snapshot.dimensions !== indexer.dimensions;

    if (rebuilt) {
      logger.info(
        {
          snapshotModel: snapshot.embeddingModel,
          snapshotDimensions: snapshot.dimensions,
          model: indexer.model,
          dimensions: indexer.dimensions,
          documents: snapshot.documents.length,
        },
        "Embedding configuration changed, rebuilding vector index"
      );
      for (const entry of snapshot.documents) {
        await store.put({ id: entry.id, text: entry.text, metadata: entry.metadata });
      }
      return { store, rebuilt };
    }

    for (const entry of snapshot.documents) {
      if (store.documents.has(entry.id)) {
        throw new DuplicateIdError(entry.id);
      }
      if (entry.vector.length !== indexer.dimensions) {
        throw new DimensionMismatchError(indexer.dimensions, entry.vector.length, `snapshot document "${entry.id}"`);
      }
      store.insert(entry.id, entry.text, { ...entry.metadata }, entry.vector);
    }
    return { store, rebuilt };
  }

  private insert(id: string, text: string, metadata: Record<string, string>, vector: readonly number[]): void {
    this.indexer.index(id, vector);
    this.lexical.add(id, text);
    this.documents.set(id, Object.freeze({ id, text, metadata: Object.freeze(metadata) }));
    this.positions.set(id, this.nextPosition);
    this.nextPosition += 1;
  }
}

function toPredicate(filter: MetadataFilter | undefined): (metadata: Readonly<Record<string, string>>) => boolean {
  if (!filter) return () => true;
  if (typeof filter === "function") return filter;
  const expected = Object.entries(filter);
  return (metadata) => expected.every(([key, value]) => metadata[key] === value);
}
