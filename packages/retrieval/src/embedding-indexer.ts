// ──────────────────────────────────────────────
// JobPulse - Embedding Indexer
// Turns text into vectors and keeps the vector index
// ──────────────────────────────────────────────

import type { EmbeddingProvider, VectorSearchHit } from "@jobpulse/types";
import {
  DimensionMismatchError,
  EmbeddingFailure,
  backoffDelay,
  createLogger,
  sanitizeErrorMessage,
  sleep,
} from "@jobpulse/utils";
import { VectorIndex } from "./vector-index.js";

const logger = createLogger("embedding-indexer");

export interface EmbeddingIndexerOptions {
  maxInputChars?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export const DEFAULT_INDEXER_OPTIONS: Required<EmbeddingIndexerOptions> = {
  maxInputChars: 8000,
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

export class EmbeddingIndexer {
  private readonly vectors: VectorIndex;
  private readonly options: Required<EmbeddingIndexerOptions>;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingIndexerOptions = {}
  ) {
    this.vectors = new VectorIndex(provider.dimensions);
    this.options = { ...DEFAULT_INDEXER_OPTIONS, ...options };
  }

  get model(): string {
    return this.provider.model;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  get size(): number {
    return this.vectors.size;
  }

  async embed(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingFailure("Cannot embed empty text");
    }
    if (text.length > this.options.maxInputChars) {
      throw new EmbeddingFailure(
        `Text of ${text.length} characters exceeds the embedding input limit of ${this.options.maxInputChars}`
      );
    }

    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        const vector = await this.provider.embed(text);
        if (vector.length !== this.provider.dimensions) {
          throw new DimensionMismatchError(
            this.provider.dimensions,
            vector.length,
            `embedding provider "${this.provider.model}"`
          );
        }
        return vector;
      } catch (err) {
        const transient = err instanceof EmbeddingFailure && err.transient;
        if (!transient || attempt >= this.options.maxAttempts) {
          throw err;
        }

        const delayMs = backoffDelay(attempt, this.options.baseDelayMs, this.options.maxDelayMs);
        logger.warn(
          {
            model: this.provider.model,
            attempt,
            maxAttempts: this.options.maxAttempts,
            delayMs,
            error: sanitizeErrorMessage(err),
          },
          "Transient embedding failure, retrying"
        );
        await sleep(delayMs);
      }
    }
  }

  index(id: string, vector: readonly number[]): void {
    this.vectors.add(id, vector);
  }

  vectorOf(id: string): readonly number[] | undefined {
    return this.vectors.get(id);
  }

  search(vector: readonly number[], topK: number): VectorSearchHit[] {
    return this.vectors.search(vector, topK);
  }
}
