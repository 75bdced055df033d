// ──────────────────────────────────────────────
// JobPulse - Vector Index
// Brute-force cosine search over an insertion-ordered map
// ──────────────────────────────────────────────

import type { VectorSearchHit } from "@jobpulse/types";
import { DimensionMismatchError, cosineSimilarity } from "@jobpulse/utils";

export class VectorIndex {
  private readonly vectors = new Map<string, readonly number[]>();

  constructor(readonly dimensions: number) {}

  get size(): number {
    return this.vectors.size;
  }

  add(id: string, vector: readonly number[]): void {
    if (vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length, `vector index (id "${id}")`);
    }
    this.vectors.set(id, Object.freeze([...vector]));
  }

  get(id: string): readonly number[] | undefined {
    return this.vectors.get(id);
  }

  search(query: readonly number[], topK: number): VectorSearchHit[] {
    if (query.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, query.length, "vector search query");
    }
    if (topK <= 0) return [];

    const scored: Array<VectorSearchHit & { position: number }> = [];
    let position = 0;
    for (const [id, vector] of this.vectors) {
      scored.push({ id, score: cosineSimilarity(query, vector), position });
      position += 1;
    }

    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, topK).map(({ id, score }) => ({ id, score }));
  }
}
