// ──────────────────────────────────────────────
// JobPulse - Hashing Embedding Provider
// Local, deterministic, no network
// ──────────────────────────────────────────────

import type { EmbeddingProvider } from "@jobpulse/types";
import { buildHashedEmbedding } from "@jobpulse/utils";

export const HASHING_EMBEDDING_MODEL = "jobpulse-hash-v1";
export const DEFAULT_HASHING_DIMENSIONS = 512;

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model = HASHING_EMBEDDING_MODEL;
  readonly dimensions: number;

  constructor(dimensions = DEFAULT_HASHING_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer, got: ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    return buildHashedEmbedding(text, this.dimensions);
  }
}
